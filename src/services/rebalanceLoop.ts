import { EventEmitter } from 'events';
import { governorConfig, RebalanceThresholds, UsageWindows } from '../config/resources';
import { getLogger } from '../logger';
import { AllocationChange } from '../types/resources';
import { MetricsProbe } from './metricsProbe';
import { proposeAllocation } from './rebalancePolicy';
import { ResourceManager } from './resourceManager';

export interface RebalanceLoopConfig {
    intervalMs: number;
    errorBackoffMs: number;
    windows: UsageWindows;
    thresholds: RebalanceThresholds;
}

export interface RebalanceCycleResult {
    evaluated: number;
    changes: AllocationChange[];
    failures: number;
}

const LOG = 'RebalanceLoop';

/**
 * Periodically samples usage for every tracked consumer and moves grants
 * toward what the consumer actually uses. Cycles never overlap; stop() is
 * honoured between pairs and before the next cycle is scheduled.
 *
 * Emits 'cycle' with a RebalanceCycleResult after each cycle. A cycle that
 * throws is logged and the next one waits for the error backoff.
 */
export class RebalanceLoop extends EventEmitter {
    private readonly manager: ResourceManager;
    private readonly probe: MetricsProbe;
    private readonly config: RebalanceLoopConfig;
    private timer: NodeJS.Timeout | null;
    private running: boolean;
    private isProcessing: boolean;
    // Bumped by stop() so an in-flight cycle can notice it was cancelled
    private generation: number;

    constructor(manager: ResourceManager, probe: MetricsProbe, config: Partial<RebalanceLoopConfig> = {}) {
        super();
        this.manager = manager;
        this.probe = probe;
        this.config = { ...governorConfig.rebalance, ...config };
        this.timer = null;
        this.running = false;
        this.isProcessing = false;
        this.generation = 0;
    }

    public start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        getLogger().info(LOG, 'Rebalance loop started', { intervalMs: this.config.intervalMs });
        this.scheduleNext(this.config.intervalMs);
    }

    public stop(): void {
        this.running = false;
        this.generation++;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        getLogger().info(LOG, 'Rebalance loop stopped');
    }

    public isRunning(): boolean {
        return this.running;
    }

    /**
     * Runs a single cycle. A pair whose sampling or adjustment fails is
     * logged and skipped; the rest of the cycle carries on.
     */
    public async runCycle(): Promise<RebalanceCycleResult> {
        const result: RebalanceCycleResult = { evaluated: 0, changes: [], failures: 0 };
        if (this.isProcessing) {
            return result;
        }

        this.isProcessing = true;
        const generation = this.generation;
        try {
            await this.probe.refresh();

            for (const history of this.manager.trackedHistories()) {
                if (generation !== this.generation) {
                    getLogger().debug(LOG, 'Cycle cancelled');
                    break;
                }

                const { consumerId, resourceType } = history;
                // The consumer may have stopped while earlier pairs were processed
                if (!this.manager.isTracking(consumerId, resourceType, history)) {
                    continue;
                }

                try {
                    const sample = this.probe.sampleUsage(consumerId, resourceType);
                    if (sample !== undefined) {
                        history.addSample(sample);
                    }

                    result.evaluated++;
                    // Evaluated under the type's lock, against the grant it replaces
                    const change = await this.manager.rebalance(consumerId, resourceType, current => {
                        const proposal = proposeAllocation(current, {
                            windows: this.config.windows,
                            thresholds: this.config.thresholds
                        });
                        if (proposal) {
                            getLogger().debug(LOG, `Proposed ${proposal.rule} for ${consumerId}/${resourceType}`, {
                                proposed: proposal.proposed,
                                allocation: current.allocation,
                                ...proposal.observed
                            });
                        }
                        return proposal;
                    });
                    if (change) {
                        result.changes.push(change);
                    }
                } catch (error) {
                    result.failures++;
                    getLogger().error(LOG, `Failed to rebalance ${resourceType} for ${consumerId}`, undefined, error);
                }
            }
        } finally {
            this.isProcessing = false;
        }

        this.emit('cycle', result);
        return result;
    }

    private scheduleNext(delayMs: number): void {
        if (!this.running) {
            return;
        }
        this.timer = setTimeout(() => {
            this.timer = null;
            this.runCycle()
                .then(() => this.scheduleNext(this.config.intervalMs))
                .catch(error => {
                    getLogger().error(LOG, 'Rebalance cycle failed', { backoffMs: this.config.errorBackoffMs }, error);
                    this.scheduleNext(this.config.errorBackoffMs);
                });
        }, delayMs);
    }
}
