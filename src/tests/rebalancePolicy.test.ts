import { describe, it, expect, beforeEach } from 'vitest';
import { proposeAllocation } from '../services/rebalancePolicy';
import { UsageHistory } from '../services/usageHistory';
import { governorConfig } from '../config/resources';
import { ResourceType } from '../types/resources';
import { ManualClock } from './__mocks__/metricsProbe';

describe('proposeAllocation', () => {
    let clock: ManualClock;
    let history: UsageHistory;

    const record = (values: number[], stepSeconds: number) => {
        values.forEach((value, index) => {
            if (index > 0) clock.advance(stepSeconds);
            history.addSample(value);
        });
    };

    beforeEach(() => {
        clock = new ManualClock();
        history = new UsageHistory('worker-a', ResourceType.CPU, { clock: clock.now });
    });

    it('should propose nothing before any usage is observed', () => {
        history.allocation = 4;
        expect(proposeAllocation(history)).toBeNull();
    });

    it('should tighten up a grant that is almost fully used', () => {
        history.allocation = 2;
        record([1.9], 0);

        expect(proposeAllocation(history)).toEqual({
            rule: 'tighten',
            proposed: 2.4,
            observed: { average: 1.9, peak: 1.9, trend: 0 }
        });
    });

    it('should shrink a grant that is mostly idle and not growing', () => {
        history.allocation = 10;
        record([2, 2], 10);

        const proposal = proposeAllocation(history);

        expect(proposal?.rule).toBe('slack');
        expect(proposal?.proposed).toBe(8);
    });

    it('should grow ahead of a rising trend instead of shrinking', () => {
        history.allocation = 10;
        record([1, 2], 10);

        const proposal = proposeAllocation(history);

        expect(proposal?.rule).toBe('forecast');
        expect(proposal?.proposed).toBe(12);
        expect(proposal?.observed.trend).toBeCloseTo(0.1, 10);
        expect(proposal?.observed.predicted).toBeCloseTo(31.5, 10);
    });

    it('should hold a grant whose forecast stays well below it', () => {
        history.allocation = 100;
        record([1, 2], 10);

        expect(proposeAllocation(history)).toBeNull();
    });

    it('should hold a grant that fits steady usage', () => {
        history.allocation = 10;
        record([7, 7, 7], 10);

        expect(proposeAllocation(history)).toBeNull();
    });

    it('should use the thresholds it is given', () => {
        history.allocation = 10;
        record([7, 7, 7], 10);

        const proposal = proposeAllocation(history, {
            thresholds: { ...governorConfig.rebalance.thresholds, tightenRatio: 0.5 }
        });

        expect(proposal).toMatchObject({ rule: 'tighten', proposed: 10.5 });
    });
});
