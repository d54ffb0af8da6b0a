import { z } from 'zod';
import { LogLevel } from '../logger';
import { ValidationError } from '../services/errors';
import { CapacityMap, RESOURCE_TYPES } from '../types/resources';

/**
 * Fraction of every resource's capacity that is never granted.
 */
export const RESERVE_FRACTION = 0.05;

export interface RebalanceThresholds {
    tightenRatio: number;       // usage above this share of the grant is "tight"
    tightenGrowth: number;
    tightenPeakFactor: number;
    slackRatio: number;         // usage below this share of the grant is "slack"
    slackShrink: number;
    slackHeadroom: number;
    forecastMinTrend: number;   // per second
    forecastHorizon: number;    // seconds
    forecastRatio: number;
    forecastGrowth: number;
    forecastHeadroom: number;
}

export interface UsageWindows {
    average: number;
    peak: number;
    trend: number;
    forecast: number;
    currentUsage: number;
    queryPeak: number;
}

export interface GovernorConfig {
    logLevel: LogLevel;
    historySize: number;
    requestTimeoutMs: number;
    server: {
        port: number;
    };
    rebalance: {
        intervalMs: number;
        errorBackoffMs: number;
        windows: UsageWindows;   // seconds
        thresholds: RebalanceThresholds;
    };
    capacityOverrides: CapacityMap;
}

export const governorConfig: GovernorConfig = {
    logLevel: 'info',
    // Samples kept per consumer and resource type
    historySize: 100,
    requestTimeoutMs: 5000,
    server: {
        port: 3000
    },
    rebalance: {
        intervalMs: 5000,
        // Wait a bit longer after a failed cycle
        errorBackoffMs: 10000,
        windows: {
            average: 30,
            peak: 120,
            trend: 300,
            forecast: 300,
            currentUsage: 10,
            queryPeak: 60
        },
        thresholds: {
            tightenRatio: 0.9,
            tightenGrowth: 1.2,
            tightenPeakFactor: 1.5,
            slackRatio: 0.6,
            slackShrink: 0.8,
            slackHeadroom: 1.3,
            forecastMinTrend: 0.01,
            forecastHorizon: 300,
            forecastRatio: 0.9,
            forecastGrowth: 1.2,
            forecastHeadroom: 1.3
        }
    },
    capacityOverrides: {}
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    PORT: positiveInt.optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    REBALANCE_INTERVAL_MS: positiveInt.optional(),
    REBALANCE_ERROR_BACKOFF_MS: positiveInt.optional()
});

const capacitySchema = z.coerce.number().finite().nonnegative();

/**
 * Builds the runtime configuration from environment variables on top of the defaults.
 * Capacities are read from RESOURCE_CAPACITY_<TYPE>, e.g. RESOURCE_CAPACITY_GPU=4.
 */
export function loadGovernorConfig(env: NodeJS.ProcessEnv = process.env): GovernorConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const variable = issue.path.join('.');
        throw new ValidationError(`Invalid environment variable ${variable}: ${issue.message}`, variable);
    }

    const capacityOverrides: CapacityMap = {};
    for (const type of RESOURCE_TYPES) {
        const variable = `RESOURCE_CAPACITY_${type}`;
        const raw = env[variable];
        if (raw === undefined || raw === '') continue;

        const capacity = capacitySchema.safeParse(raw);
        if (!capacity.success) {
            throw new ValidationError(`Invalid environment variable ${variable}: ${capacity.error.issues[0].message}`, variable);
        }
        capacityOverrides[type] = capacity.data;
    }

    const values = parsed.data;
    return {
        ...governorConfig,
        logLevel: values.LOG_LEVEL ?? governorConfig.logLevel,
        server: {
            port: values.PORT ?? governorConfig.server.port
        },
        rebalance: {
            ...governorConfig.rebalance,
            intervalMs: values.REBALANCE_INTERVAL_MS ?? governorConfig.rebalance.intervalMs,
            errorBackoffMs: values.REBALANCE_ERROR_BACKOFF_MS ?? governorConfig.rebalance.errorBackoffMs
        },
        capacityOverrides
    };
}
