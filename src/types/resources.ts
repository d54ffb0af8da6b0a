/**
 * Core types for resource admission and allocation
 */

export enum ResourceType {
    CPU = 'CPU',          // cores
    MEMORY = 'MEMORY',    // MB
    STORAGE = 'STORAGE',  // MB
    NETWORK = 'NETWORK',  // Mbps
    GPU = 'GPU',          // compute units
    IO = 'IO'             // ops/sec
}

export const RESOURCE_TYPES: readonly ResourceType[] = Object.values(ResourceType);

export function isResourceType(value: unknown): value is ResourceType {
    return RESOURCE_TYPES.some(type => type === value);
}

export enum Priority {
    CRITICAL = 'CRITICAL',
    HIGH = 'HIGH',
    NORMAL = 'NORMAL',
    LOW = 'LOW',
    IDLE = 'IDLE'
}

export interface ResourceRequest {
    consumerId: string;
    resourceType: ResourceType;
    requestedAmount: number;
    priority: Priority;
    reason?: string;
}

/**
 * Outcome of a request. `success` means the request was granted in full;
 * a partial grant reports `success: false` with a nonzero `allocatedAmount`.
 */
export interface ResourceAllocation {
    consumerId: string;
    resourceType: ResourceType;
    requestedAmount: number;
    allocatedAmount: number;
    success: boolean;
    message: string;
}

export interface ReleaseResult {
    consumerId: string;
    resourceType: ResourceType;
    success: boolean;
    message: string;
}

export type RebalanceRule = 'tighten' | 'slack' | 'forecast';

export interface AllocationChange {
    consumerId: string;
    resourceType: ResourceType;
    previousAllocation: number;
    allocation: number;
    rule: RebalanceRule;
    timestamp: Date;
}

export interface UsageSample {
    timestamp: number;  // epoch milliseconds
    value: number;
}

export type CapacityMap = Partial<Record<ResourceType, number>>;

export interface ConsumerResourceUsage {
    allocation: number;
    currentUsage: number;
    peakUsage: number;
    trend: number;
}

export interface ConsumerUsageReport {
    scope: 'consumer';
    consumerId: string;
    resources: Partial<Record<ResourceType, ConsumerResourceUsage>>;
}

export interface ResourceTotals {
    capacity: number;
    allocated: number;
    available: number;
}

export interface SystemUsageReport {
    scope: 'system';
    totals: Record<ResourceType, ResourceTotals>;
    consumers: Record<string, Partial<Record<ResourceType, Pick<ConsumerResourceUsage, 'allocation' | 'currentUsage'>>>>;
}

export type UsageReport = ConsumerUsageReport | SystemUsageReport;

export interface ResourceManagerEvents {
    'allocation:changed': AllocationChange;
    'allocation:released': ReleaseResult;
    'consumer:started': { consumerId: string };
    'consumer:stopped': { consumerId: string; released: CapacityMap };
}
