import { ResourceType, UsageSample } from '../types/resources';
import { ValidationError } from './errors';

export type Clock = () => number;

export interface UsageHistoryOptions {
    maxSamples?: number;
    clock?: Clock;
}

const DEFAULT_MAX_SAMPLES = 100;

/**
 * Rolling usage record for one consumer and resource type, together with
 * the amount currently granted to it.
 */
export class UsageHistory {
    public readonly consumerId: string;
    public readonly resourceType: ResourceType;
    private samples: UsageSample[] = [];
    private currentAllocation = 0;
    private readonly maxSamples: number;
    private readonly clock: Clock;

    constructor(consumerId: string, resourceType: ResourceType, options: UsageHistoryOptions = {}) {
        this.consumerId = consumerId;
        this.resourceType = resourceType;
        this.maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
        this.clock = options.clock ?? Date.now;
    }

    get allocation(): number {
        return this.currentAllocation;
    }

    set allocation(amount: number) {
        if (!Number.isFinite(amount) || amount < 0) {
            throw new ValidationError(`Allocation must be a non-negative number, got ${amount}`, 'allocation');
        }
        this.currentAllocation = amount;
    }

    get sampleCount(): number {
        return this.samples.length;
    }

    public getSamples(): readonly UsageSample[] {
        return this.samples;
    }

    public addSample(value: number, timestamp: number = this.clock()): void {
        if (!Number.isFinite(value) || value < 0) {
            throw new ValidationError(`Usage sample must be a non-negative number, got ${value}`, 'value');
        }

        this.samples.push({ timestamp, value });
        if (this.samples.length > this.maxSamples) {
            this.samples.splice(0, this.samples.length - this.maxSamples);
        }
    }

    /**
     * Mean of the samples taken within the last `windowSeconds`; 0 when there are none.
     */
    public average(windowSeconds: number = 60): number {
        const recent = this.window(windowSeconds);
        if (recent.length === 0) return 0;
        return recent.reduce((sum, sample) => sum + sample.value, 0) / recent.length;
    }

    public peak(windowSeconds: number = 60): number {
        const recent = this.window(windowSeconds);
        if (recent.length === 0) return 0;
        return Math.max(...recent.map(sample => sample.value));
    }

    /**
     * Least-squares slope of usage against time, in units per second.
     * Returns 0 when there is not enough data to fit a line.
     */
    public trend(windowSeconds: number = 300): number {
        const recent = this.window(windowSeconds);
        if (recent.length < 2) return 0;

        const start = Math.min(...recent.map(sample => sample.timestamp));
        const n = recent.length;
        let sumX = 0;
        let sumY = 0;
        let sumXY = 0;
        let sumX2 = 0;

        for (const sample of recent) {
            const x = (sample.timestamp - start) / 1000;
            sumX += x;
            sumY += sample.value;
            sumXY += x * sample.value;
            sumX2 += x * x;
        }

        const denominator = n * sumX2 - sumX * sumX;
        if (denominator === 0) return 0;

        const slope = (n * sumXY - sumX * sumY) / denominator;
        return Number.isFinite(slope) ? slope : 0;
    }

    private window(windowSeconds: number): UsageSample[] {
        const now = this.clock();
        const windowMs = windowSeconds * 1000;
        return this.samples.filter(sample => now - sample.timestamp <= windowMs);
    }
}
