#!/usr/bin/env node
import { loadGovernorConfig } from './config/resources';
import { Governor } from './governor';
import { createConsoleLogger, getLogger, setLogger } from './logger';

async function main(): Promise<void> {
    const config = loadGovernorConfig();
    setLogger(createConsoleLogger(config.logLevel));

    const governor = await Governor.create({ config });
    governor.start(true);

    const shutdown = (signal: string) => {
        getLogger().info('Governor', `Received ${signal}, shutting down`);
        governor.stop()
            .then(() => process.exit(0))
            .catch(error => {
                getLogger().error('Governor', 'Shutdown failed', undefined, error);
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
    getLogger().error('Governor', 'Failed to start', undefined, error);
    process.exit(1);
});
