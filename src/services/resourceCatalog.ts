import { getLogger } from '../logger';
import { CapacityMap, RESOURCE_TYPES, ResourceType } from '../types/resources';
import { MetricsProbe } from './metricsProbe';

/**
 * Total capacity per resource type. Built once at startup and never changed.
 */
export class ResourceCatalog {
    private readonly capacities: ReadonlyMap<ResourceType, number>;

    constructor(capacities: CapacityMap) {
        const entries = new Map<ResourceType, number>();
        for (const type of RESOURCE_TYPES) {
            const capacity = capacities[type];
            if (capacity !== undefined && Number.isFinite(capacity) && capacity >= 0) {
                entries.set(type, capacity);
            }
        }
        this.capacities = entries;
    }

    /**
     * Asks the probe for the machine's capacities; configured overrides win.
     */
    public static async discover(probe: MetricsProbe, overrides: CapacityMap = {}): Promise<ResourceCatalog> {
        const discovered = await probe.discoverCapacity();
        const catalog = new ResourceCatalog({ ...discovered, ...overrides });
        getLogger().info('ResourceCatalog', 'Discovered resources', catalog.toJSON());
        return catalog;
    }

    public capacity(type: ResourceType): number {
        return this.capacities.get(type) ?? 0;
    }

    public has(type: ResourceType): boolean {
        return this.capacities.has(type);
    }

    public types(): ResourceType[] {
        return Array.from(this.capacities.keys());
    }

    public toJSON(): CapacityMap {
        const capacities: CapacityMap = {};
        for (const [type, capacity] of this.capacities) {
            capacities[type] = capacity;
        }
        return capacities;
    }
}
