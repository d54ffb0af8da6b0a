import { vi } from 'vitest';
import { MetricsProbe } from '../../services/metricsProbe';
import { CapacityMap, ResourceType } from '../../types/resources';

/**
 * Probe whose readings are set by the test, per consumer and resource type.
 */
export class FakeMetricsProbe implements MetricsProbe {
    private readings: Map<string, number> = new Map();

    constructor(private capacities: CapacityMap = {}) {}

    setUsage(consumerId: string, resourceType: ResourceType, value: number | undefined): void {
        const key = `${consumerId}/${resourceType}`;
        if (value === undefined) {
            this.readings.delete(key);
        } else {
            this.readings.set(key, value);
        }
    }

    discoverCapacity = vi.fn(async (): Promise<CapacityMap> => ({ ...this.capacities }));

    refresh = vi.fn(async (): Promise<void> => undefined);

    sampleUsage = vi.fn((consumerId: string, resourceType: ResourceType): number | undefined =>
        this.readings.get(`${consumerId}/${resourceType}`)
    );
}

/**
 * Hand-driven clock in epoch milliseconds.
 */
export class ManualClock {
    constructor(private current: number = 1_700_000_000_000) {}

    now = (): number => this.current;

    advance(seconds: number): void {
        this.current += seconds * 1000;
    }
}
