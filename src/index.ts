export * from './types/resources';
export * from './config/resources';
export * from './logger';
export * from './services/messages';
export { Governor } from './governor';
export type { GovernorOptions } from './governor';
export { createApp } from './server';
export type { AppDependencies } from './server';
export { decideAllocation } from './services/allocationArbiter';
export type { AllocationDecision } from './services/allocationArbiter';
export { AllocationEventStream } from './services/allocationEventStream';
export { ValidationError } from './services/errors';
export { KeyedMutex } from './services/keyedMutex';
export { MessageBus, topicMatches } from './services/messageBus';
export type { BusMessage } from './services/messageBus';
export { OsMetricsProbe } from './services/metricsProbe';
export type { MetricsProbe } from './services/metricsProbe';
export { RebalanceLoop } from './services/rebalanceLoop';
export type { RebalanceCycleResult } from './services/rebalanceLoop';
export { proposeAllocation } from './services/rebalancePolicy';
export type { RebalanceProposal } from './services/rebalancePolicy';
export { ResourceBusBinding } from './services/resourceBusBinding';
export { ResourceClient } from './services/resourceClient';
export type { ResourceClientOptions, ResourceRequestOptions } from './services/resourceClient';
export { ResourceCatalog } from './services/resourceCatalog';
export { ResourceManager } from './services/resourceManager';
export type { AllocationProposer, ResourceManagerOptions } from './services/resourceManager';
export { UsageHistory } from './services/usageHistory';
