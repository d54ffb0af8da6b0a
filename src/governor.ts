import { Server } from 'http';
import { GovernorConfig, loadGovernorConfig } from './config/resources';
import { getLogger } from './logger';
import { createApp } from './server';
import { AllocationEventStream } from './services/allocationEventStream';
import { MessageBus } from './services/messageBus';
import { MetricsProbe, OsMetricsProbe } from './services/metricsProbe';
import { RebalanceLoop } from './services/rebalanceLoop';
import { ResourceBusBinding } from './services/resourceBusBinding';
import { ResourceCatalog } from './services/resourceCatalog';
import { ResourceManager } from './services/resourceManager';
import { Clock } from './services/usageHistory';

export interface GovernorOptions {
    config?: GovernorConfig;
    probe?: MetricsProbe;
    bus?: MessageBus;
    clock?: Clock;
}

/**
 * Everything one governor process needs, built once at startup and passed
 * to whoever handles messages or HTTP requests.
 */
export class Governor {
    public readonly config: GovernorConfig;
    public readonly catalog: ResourceCatalog;
    public readonly manager: ResourceManager;
    public readonly loop: RebalanceLoop;
    public readonly bus: MessageBus;
    public readonly binding: ResourceBusBinding;
    public readonly stream: AllocationEventStream;
    private server: Server | null = null;

    private constructor(config: GovernorConfig, catalog: ResourceCatalog, probe: MetricsProbe, bus: MessageBus, clock?: Clock) {
        this.config = config;
        this.catalog = catalog;
        this.manager = new ResourceManager(catalog, {
            historySize: config.historySize,
            windows: config.rebalance.windows,
            clock
        });
        this.loop = new RebalanceLoop(this.manager, probe, config.rebalance);
        this.bus = bus;
        this.binding = new ResourceBusBinding(bus, this.manager);
        this.stream = new AllocationEventStream();
    }

    public static async create(options: GovernorOptions = {}): Promise<Governor> {
        const config = options.config ?? loadGovernorConfig();
        const probe = options.probe ?? new OsMetricsProbe();
        const catalog = await ResourceCatalog.discover(probe, config.capacityOverrides);
        return new Governor(config, catalog, probe, options.bus ?? new MessageBus(), options.clock);
    }

    /**
     * Wires the bus and event stream and starts rebalancing. Pass `listen` to
     * also serve HTTP on the configured port.
     */
    public start(listen: boolean = false): void {
        this.binding.attach();
        this.stream.follow(this.manager);
        this.loop.start();

        if (listen && !this.server) {
            const app = createApp({ manager: this.manager, stream: this.stream, loop: this.loop });
            this.server = app.listen(this.config.server.port, () => {
                getLogger().info('Governor', `Resource governor listening on port ${this.config.server.port}`);
            });
        }
    }

    public async stop(): Promise<void> {
        this.loop.stop();
        this.binding.detach();
        this.stream.close();

        const server = this.server;
        this.server = null;
        if (server) {
            await new Promise<void>((resolve, reject) => {
                server.close(error => (error ? reject(error) : resolve()));
            });
        }
    }
}
