import { vi } from 'vitest';
import { Logger, setLogger } from '../logger';

/**
 * Installs a logger whose methods are spies and that prints nothing.
 */
export function installSilentLogger(): Logger {
    const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    };
    setLogger(logger);
    return logger;
}
