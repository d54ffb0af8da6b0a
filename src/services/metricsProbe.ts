import os from 'os';
import { statfs } from 'fs/promises';
import { CapacityMap, ResourceType } from '../types/resources';

const MB = 1024 * 1024;

/**
 * Source of capacities and usage readings. Values are in each resource's own
 * units (cores, MB, ...), so they compare directly against grants.
 */
export interface MetricsProbe {
    discoverCapacity(): Promise<CapacityMap>;
    // Called once at the start of every rebalance cycle
    refresh(): Promise<void>;
    sampleUsage(consumerId: string, resourceType: ResourceType): number | undefined;
}

export interface SystemUsage {
    cpu: number;
    memory: number;
    storage?: number;
}

/**
 * Probe backed by the host's own counters. It has no per-consumer accounting,
 * so every consumer sees the system-wide reading.
 */
export class OsMetricsProbe implements MetricsProbe {
    private usage: SystemUsage | null = null;
    private readonly storagePath: string;

    constructor(storagePath: string = '/') {
        this.storagePath = storagePath;
    }

    public async discoverCapacity(): Promise<CapacityMap> {
        const capacity: CapacityMap = {
            [ResourceType.CPU]: os.cpus().length,
            [ResourceType.MEMORY]: os.totalmem() / MB
        };

        const storage = await this.readStorage();
        if (storage) {
            capacity[ResourceType.STORAGE] = storage.total;
        }
        return capacity;
    }

    public async refresh(): Promise<void> {
        const cores = os.cpus().length;
        const storage = await this.readStorage();

        this.usage = {
            // 1-minute load average approximates busy cores
            cpu: Math.min(os.loadavg()[0], cores),
            memory: (os.totalmem() - os.freemem()) / MB,
            storage: storage?.used
        };
    }

    public sampleUsage(_consumerId: string, resourceType: ResourceType): number | undefined {
        if (!this.usage) return undefined;

        switch (resourceType) {
            case ResourceType.CPU:
                return this.usage.cpu;
            case ResourceType.MEMORY:
                return this.usage.memory;
            case ResourceType.STORAGE:
                return this.usage.storage;
            default:
                return undefined;
        }
    }

    public getSystemUsage(): SystemUsage | null {
        return this.usage;
    }

    private async readStorage(): Promise<{ total: number; used: number } | null> {
        try {
            const stats = await statfs(this.storagePath);
            return {
                total: (stats.blocks * stats.bsize) / MB,
                used: ((stats.blocks - stats.bfree) * stats.bsize) / MB
            };
        } catch {
            // statfs is unavailable on some platforms; storage is then left untracked
            return null;
        }
    }
}
