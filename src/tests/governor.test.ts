import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Governor } from '../governor';
import { governorConfig } from '../config/resources';
import { ResourceClient } from '../services/resourceClient';
import { ResourceType } from '../types/resources';
import { FakeMetricsProbe } from './__mocks__/metricsProbe';
import { installSilentLogger } from './helpers';

describe('Governor', () => {
    let probe: FakeMetricsProbe;
    let governor: Governor;

    beforeEach(async () => {
        installSilentLogger();
        probe = new FakeMetricsProbe({ [ResourceType.CPU]: 4, [ResourceType.MEMORY]: 8192 });
        governor = await Governor.create({
            probe,
            config: {
                ...governorConfig,
                rebalance: { ...governorConfig.rebalance, intervalMs: 60000 },
                capacityOverrides: { [ResourceType.GPU]: 2 }
            }
        });
    });

    afterEach(async () => {
        await governor.stop();
    });

    it('should build its catalog from the probe and the overrides', () => {
        expect(governor.catalog.toJSON()).toEqual({
            [ResourceType.CPU]: 4,
            [ResourceType.MEMORY]: 8192,
            [ResourceType.GPU]: 2
        });
    });

    it('should serve consumers over the bus once started', async () => {
        governor.start();
        const client = new ResourceClient(governor.bus, 'worker');
        await client.start();

        const granted = await client.requestResource(ResourceType.GPU, 1);

        expect(granted).toBe(1);
        expect(governor.manager.getAllocation('worker', ResourceType.GPU)).toBe(1);
        expect(governor.loop.isRunning()).toBe(true);
        expect(governor.binding.isAttached()).toBe(true);
    });

    it('should stop rebalancing and detach from the bus', async () => {
        governor.start();

        await governor.stop();

        expect(governor.loop.isRunning()).toBe(false);
        expect(governor.binding.isAttached()).toBe(false);
        expect(governor.bus.subscriberCount()).toBe(0);
    });
});
