import { Request, Response } from 'express';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { AllocationChange, ResourceType } from '../types/resources';
import { toAllocationNotification, Topics } from './messages';
import { ResourceManager } from './resourceManager';

export interface StreamClient {
    id: string;
    response: Response;
    // Empty means every resource type
    resourceTypes: ResourceType[];
}

/**
 * Server-Sent Events feed of allocation changes for HTTP clients.
 */
export class AllocationEventStream extends EventEmitter {
    private clients: Map<string, StreamClient> = new Map();
    private retryInterval: number = 3000;
    private source: ResourceManager | null = null;
    private readonly onAllocationChanged = (change: AllocationChange) => {
        this.publish(change);
    };

    /**
     * Starts forwarding a manager's allocation changes to connected clients.
     */
    public follow(manager: ResourceManager): void {
        this.unfollow();
        this.source = manager;
        manager.on('allocation:changed', this.onAllocationChanged);
    }

    public unfollow(): void {
        if (this.source) {
            this.source.off('allocation:changed', this.onAllocationChanged);
            this.source = null;
        }
    }

    /**
     * Opens the event stream for a client
     */
    public connect(req: Request, res: Response, resourceTypes: ResourceType[] = []): string {
        const clientId = uuidv4();

        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive',
            'X-Accel-Buffering': 'no' // Disable Nginx buffering
        });
        res.write(`retry: ${this.retryInterval}\n\n`);

        this.clients.set(clientId, {
            id: clientId,
            response: res,
            resourceTypes
        });
        this.emit('client:connected', clientId);

        req.on('close', () => this.disconnect(clientId));

        return clientId;
    }

    public disconnect(clientId: string): void {
        const client = this.clients.get(clientId);
        if (client) {
            client.response.end();
            this.clients.delete(clientId);
            this.emit('client:disconnected', clientId);
        }
    }

    /**
     * Sends an allocation change to every client watching its resource type
     */
    public publish(change: AllocationChange): void {
        const data = JSON.stringify(toAllocationNotification(change));
        this.clients.forEach(client => {
            if (client.resourceTypes.length === 0 || client.resourceTypes.includes(change.resourceType)) {
                client.response.write(this.formatMessage(Topics.ALLOCATION, data));
            }
        });
    }

    public getClients(): Map<string, StreamClient> {
        return new Map(this.clients);
    }

    public setRetryInterval(interval: number): void {
        this.retryInterval = interval;
        this.clients.forEach(client => {
            client.response.write(`retry: ${interval}\n\n`);
        });
    }

    public close(): void {
        this.unfollow();
        this.clients.forEach(client => {
            client.response.end();
        });
        this.clients.clear();
    }

    private formatMessage(event: string, data: string): string {
        return `event: ${event}\ndata: ${data}\n\n`;
    }
}
