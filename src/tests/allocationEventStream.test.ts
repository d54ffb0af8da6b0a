import { describe, it, expect, beforeEach, afterEach, vi, Mock } from 'vitest';
import { Request, Response } from 'express';
import { AllocationEventStream } from '../services/allocationEventStream';
import { ResourceManager } from '../services/resourceManager';
import { ResourceCatalog } from '../services/resourceCatalog';
import { AllocationChange, Priority, ResourceType } from '../types/resources';
import { installSilentLogger } from './helpers';

const change = (resourceType: ResourceType): AllocationChange => ({
    consumerId: 'worker',
    resourceType,
    previousAllocation: 2,
    allocation: 2.4,
    rule: 'tighten',
    timestamp: new Date(0)
});

const frame = (resourceType: ResourceType) =>
    `event: resource.allocation\ndata: {"consumer_id":"worker","resource_type":"${resourceType}","allocation":2.4,"previous_allocation":2}\n\n`;

describe('AllocationEventStream', () => {
    let stream: AllocationEventStream;
    let onRequest: Mock;
    let mockRequest: Partial<Request>;

    const mockResponse = (): Partial<Response> => ({
        writeHead: vi.fn(),
        write: vi.fn(),
        end: vi.fn()
    });

    beforeEach(() => {
        installSilentLogger();
        stream = new AllocationEventStream();
        onRequest = vi.fn();
        mockRequest = { on: onRequest };
    });

    afterEach(() => {
        stream.close();
    });

    describe('Connection Management', () => {
        it('should open the stream with event-stream headers and a retry hint', () => {
            const response = mockResponse();

            const clientId = stream.connect(mockRequest as Request, response as Response);

            expect(typeof clientId).toBe('string');
            expect(response.writeHead).toHaveBeenCalledWith(200, {
                'Content-Type': 'text/event-stream',
                'Cache-Control': 'no-cache',
                'Connection': 'keep-alive',
                'X-Accel-Buffering': 'no'
            });
            expect(response.write).toHaveBeenCalledWith('retry: 3000\n\n');
            expect(stream.getClients().get(clientId)?.resourceTypes).toEqual([]);
        });

        it('should drop a client when its request closes', () => {
            const response = mockResponse();
            const clientId = stream.connect(mockRequest as Request, response as Response);
            const [event, closeHandler] = onRequest.mock.calls[0];

            expect(event).toBe('close');
            closeHandler();

            expect(stream.getClients().has(clientId)).toBe(false);
            expect(response.end).toHaveBeenCalledTimes(1);
        });
    });

    describe('Publishing', () => {
        it('should send changes to unfiltered clients and to clients watching the type', () => {
            const everything = mockResponse();
            const cpuOnly = mockResponse();
            const memoryOnly = mockResponse();
            stream.connect(mockRequest as Request, everything as Response);
            stream.connect(mockRequest as Request, cpuOnly as Response, [ResourceType.CPU]);
            stream.connect(mockRequest as Request, memoryOnly as Response, [ResourceType.MEMORY]);

            stream.publish(change(ResourceType.CPU));

            expect(everything.write).toHaveBeenLastCalledWith(frame(ResourceType.CPU));
            expect(cpuOnly.write).toHaveBeenLastCalledWith(frame(ResourceType.CPU));
            expect(memoryOnly.write).toHaveBeenCalledTimes(1);
        });

        it('should forward the changes of the manager it follows', async () => {
            const manager = new ResourceManager(new ResourceCatalog({ [ResourceType.CPU]: 8 }));
            const response = mockResponse();
            stream.connect(mockRequest as Request, response as Response);
            stream.follow(manager);
            await manager.handleRequest({
                consumerId: 'worker',
                resourceType: ResourceType.CPU,
                requestedAmount: 2,
                priority: Priority.NORMAL
            });

            await manager.adjustAllocation('worker', ResourceType.CPU, 2.4, 'tighten');
            stream.unfollow();
            await manager.adjustAllocation('worker', ResourceType.CPU, 3, 'tighten');

            expect(response.write).toHaveBeenCalledTimes(2);
            expect(response.write).toHaveBeenLastCalledWith(frame(ResourceType.CPU));
        });
    });

    describe('Connection Settings', () => {
        it('should push a new retry interval to every client', () => {
            const response = mockResponse();
            stream.connect(mockRequest as Request, response as Response);

            stream.setRetryInterval(5000);

            expect(response.write).toHaveBeenLastCalledWith('retry: 5000\n\n');
        });
    });

    describe('Cleanup', () => {
        it('should close all connections', () => {
            const first = mockResponse();
            const second = mockResponse();
            stream.connect(mockRequest as Request, first as Response);
            stream.connect(mockRequest as Request, second as Response);

            stream.close();

            expect(first.end).toHaveBeenCalledTimes(1);
            expect(second.end).toHaveBeenCalledTimes(1);
            expect(stream.getClients().size).toBe(0);
        });
    });
});
