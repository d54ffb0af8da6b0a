import { governorConfig, RebalanceThresholds, UsageWindows } from '../config/resources';
import { RebalanceRule } from '../types/resources';
import { UsageHistory } from './usageHistory';

export interface RebalanceProposal {
    rule: RebalanceRule;
    proposed: number;
    observed: {
        average: number;
        peak: number;
        trend: number;
        predicted?: number;
    };
}

export interface RebalancePolicyOptions {
    windows?: UsageWindows;
    thresholds?: RebalanceThresholds;
}

/**
 * Looks at a pair's recent usage and proposes a new grant, or null when the
 * current grant fits or the pair has no samples yet. Tighten-up and slack-down are checked first; the
 * forecast rule only runs when neither of them fired.
 */
export function proposeAllocation(
    history: UsageHistory,
    options: RebalancePolicyOptions = {}
): RebalanceProposal | null {
    const windows = options.windows ?? governorConfig.rebalance.windows;
    const t = options.thresholds ?? governorConfig.rebalance.thresholds;
    const allocation = history.allocation;

    // Nothing observed yet: keep the grant as requested
    if (history.sampleCount === 0) return null;

    const average = history.average(windows.average);
    const peak = history.peak(windows.peak);
    const trend = history.trend(windows.trend);
    const observed = { average, peak, trend };

    if (average > allocation * t.tightenRatio) {
        return {
            rule: 'tighten',
            proposed: Math.min(allocation * t.tightenGrowth, peak * t.tightenPeakFactor),
            observed
        };
    }

    if (average < allocation * t.slackRatio && trend <= 0) {
        return {
            rule: 'slack',
            proposed: Math.max(allocation * t.slackShrink, average * t.slackHeadroom),
            observed
        };
    }

    if (trend > t.forecastMinTrend) {
        const predicted = history.average(windows.forecast) + trend * t.forecastHorizon;
        if (predicted > allocation * t.forecastRatio) {
            return {
                rule: 'forecast',
                proposed: Math.min(allocation * t.forecastGrowth, predicted * t.forecastHeadroom),
                observed: { ...observed, predicted }
            };
        }
    }

    return null;
}
