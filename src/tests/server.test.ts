import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createApp } from '../server';
import { AllocationEventStream } from '../services/allocationEventStream';
import { RebalanceLoop } from '../services/rebalanceLoop';
import { ResourceManager } from '../services/resourceManager';
import { ResourceCatalog } from '../services/resourceCatalog';
import { ResourceType } from '../types/resources';
import { FakeMetricsProbe } from './__mocks__/metricsProbe';
import { installSilentLogger } from './helpers';

describe('Server Integration Tests', () => {
    let manager: ResourceManager;
    let stream: AllocationEventStream;
    let loop: RebalanceLoop;
    let app: express.Express;

    beforeEach(() => {
        installSilentLogger();
        manager = new ResourceManager(new ResourceCatalog({ [ResourceType.CPU]: 8, [ResourceType.MEMORY]: 16384 }));
        stream = new AllocationEventStream();
        loop = new RebalanceLoop(manager, new FakeMetricsProbe(), { intervalMs: 60000 });
        app = createApp({ manager, stream, loop });
    });

    afterEach(() => {
        loop.stop();
        stream.close();
    });

    describe('Health', () => {
        it('should report whether rebalancing is running', async () => {
            const idle = await request(app).get('/health');
            expect(idle.status).toBe(200);
            expect(idle.body).toEqual({ status: 'ok', rebalancing: false });

            loop.start();
            const running = await request(app).get('/health');
            expect(running.body).toEqual({ status: 'ok', rebalancing: true });
        });
    });

    describe('Resources', () => {
        it('should grant a request', async () => {
            const response = await request(app)
                .post('/resources/request')
                .send({ request_id: 'req-1', consumer_id: 'A', resource_type: 'CPU', requested_amount: 3 });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                request_id: 'req-1',
                consumer_id: 'A',
                resource_type: 'CPU',
                requested_amount: 3,
                allocated_amount: 3,
                success: true,
                message: 'Resource request granted'
            });
        });

        it('should report a partial grant as a 200 with success false', async () => {
            await request(app).post('/resources/request').send({ consumer_id: 'A', resource_type: 'CPU', requested_amount: 7 });

            const response = await request(app)
                .post('/resources/request')
                .send({ consumer_id: 'B', resource_type: 'CPU', requested_amount: 2 });

            expect(response.status).toBe(200);
            expect(response.body.success).toBe(false);
            expect(response.body.allocated_amount).toBeCloseTo(0.6, 10);
        });

        it('should reject an unknown resource type with a 400', async () => {
            const response = await request(app)
                .post('/resources/request')
                .send({ consumer_id: 'A', resource_type: 'QUANTUM', requested_amount: 1 });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                success: false,
                message: 'Invalid resource_type: unknown resource type "QUANTUM"'
            });
            expect(manager.hasConsumer('A')).toBe(false);
        });

        it('should release a grant', async () => {
            await request(app).post('/resources/request').send({ consumer_id: 'A', resource_type: 'MEMORY', requested_amount: 1024 });

            const response = await request(app)
                .post('/resources/release')
                .send({ consumer_id: 'A', resource_type: 'MEMORY' });

            expect(response.status).toBe(200);
            expect(response.body).toMatchObject({ success: true, message: 'Resource MEMORY released' });
            expect(manager.getAllocation('A', ResourceType.MEMORY)).toBe(0);
        });

        it('should answer an unallocated release with success false', async () => {
            const response = await request(app)
                .post('/resources/release')
                .send({ consumer_id: 'A', resource_type: 'CPU' });

            expect(response.status).toBe(200);
            expect(response.body).toMatchObject({ success: false, message: 'Resource CPU was not allocated to A' });
        });

        it('should reject a malformed release with a 400', async () => {
            const response = await request(app).post('/resources/release').send({ consumer_id: 'A' });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({ success: false, message: 'Invalid resource_type: Required' });
        });
    });

    describe('Consumers', () => {
        it('should start and stop a consumer', async () => {
            const started = await request(app).post('/consumers/worker/start');
            expect(started.body).toEqual({ success: true });
            expect(manager.hasConsumer('worker')).toBe(true);

            await request(app).post('/resources/request').send({ consumer_id: 'worker', resource_type: 'CPU', requested_amount: 2 });
            const stopped = await request(app).post('/consumers/worker/stop');

            expect(stopped.body).toEqual({ success: true, released: { CPU: 2 } });
            expect(manager.hasConsumer('worker')).toBe(false);
        });
    });

    describe('Usage', () => {
        it('should report system usage', async () => {
            await request(app).post('/resources/request').send({ consumer_id: 'A', resource_type: 'CPU', requested_amount: 2 });

            const response = await request(app).get('/usage');

            expect(response.status).toBe(200);
            expect(response.body.scope).toBe('system');
            expect(response.body.totals.CPU).toMatchObject({ capacity: 8, allocated: 2 });
            expect(response.body.consumers).toEqual({ A: { CPU: { allocation: 2, currentUsage: 0 } } });
        });

        it('should report a single consumer', async () => {
            await request(app).post('/resources/request').send({ consumer_id: 'A', resource_type: 'CPU', requested_amount: 2 });

            const response = await request(app).get('/usage/A');

            expect(response.body).toEqual({
                scope: 'consumer',
                consumerId: 'A',
                resources: { CPU: { allocation: 2, currentUsage: 0, peakUsage: 0, trend: 0 } }
            });
        });

        it('should return 404 for an unknown consumer', async () => {
            const response = await request(app).get('/usage/ghost');

            expect(response.status).toBe(404);
            expect(response.body).toEqual({ success: false, error: 'Component ghost not found' });
        });
    });

    describe('Events', () => {
        it('should reject an unknown resource type filter', async () => {
            const response = await request(app).get('/events?types=CPU,QUANTUM');

            expect(response.status).toBe(400);
            expect(response.body).toEqual({ success: false, message: 'unknown resource type "QUANTUM"' });
            expect(stream.getClients().size).toBe(0);
        });
    });
});
