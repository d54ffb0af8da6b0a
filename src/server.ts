import express, { Response } from 'express';
import { AllocationEventStream } from './services/allocationEventStream';
import { errorMessage, ValidationError } from './services/errors';
import {
    parseReleaseMessage,
    parseRequestMessage,
    toReleaseReply,
    toRequestReply
} from './services/messages';
import { RebalanceLoop } from './services/rebalanceLoop';
import { ResourceManager } from './services/resourceManager';
import { isResourceType, ResourceType } from './types/resources';

export interface AppDependencies {
    manager: ResourceManager;
    stream: AllocationEventStream;
    loop?: RebalanceLoop;
}

function sendError(res: Response, error: unknown): void {
    res.status(error instanceof ValidationError ? 400 : 500).json({
        success: false,
        message: errorMessage(error)
    });
}

function parseTypes(raw: unknown): ResourceType[] {
    if (typeof raw !== 'string' || raw.trim() === '') {
        return [];
    }
    return raw.split(',').map(part => {
        const type = part.trim().toUpperCase();
        if (!isResourceType(type)) {
            throw new ValidationError(`unknown resource type "${part.trim()}"`, 'types');
        }
        return type;
    });
}

/**
 * HTTP surface of the governor: request/release, lifecycle, usage queries
 * and a live feed of allocation changes.
 */
export function createApp({ manager, stream, loop }: AppDependencies): express.Express {
    const app = express();
    app.use(express.json());

    app.get('/health', (req, res) => {
        res.json({ status: 'ok', rebalancing: loop?.isRunning() ?? false });
    });

    app.post('/resources/request', async (req, res) => {
        try {
            const { requestId, request } = parseRequestMessage(req.body);
            const allocation = await manager.handleRequest(request);
            res.json(toRequestReply(allocation, requestId));
        } catch (error) {
            sendError(res, error);
        }
    });

    app.post('/resources/release', async (req, res) => {
        try {
            const { requestId, consumerId, resourceType } = parseReleaseMessage(req.body);
            const result = await manager.handleRelease(consumerId, resourceType);
            res.json(toReleaseReply(result, requestId));
        } catch (error) {
            sendError(res, error);
        }
    });

    app.post('/consumers/:consumerId/start', (req, res) => {
        manager.onConsumerStarted(req.params.consumerId);
        res.json({ success: true });
    });

    app.post('/consumers/:consumerId/stop', (req, res) => {
        const released = manager.onConsumerStopped(req.params.consumerId);
        res.json({ success: true, released });
    });

    app.get('/usage', (req, res) => {
        res.json(manager.getUsage());
    });

    app.get('/usage/:consumerId', (req, res) => {
        const report = manager.getUsage(req.params.consumerId);
        if (!report) {
            res.status(404).json({
                success: false,
                error: `Component ${req.params.consumerId} not found`
            });
            return;
        }
        res.json(report);
    });

    app.get('/events', (req, res) => {
        try {
            stream.connect(req, res, parseTypes(req.query.types));
        } catch (error) {
            sendError(res, error);
        }
    });

    return app;
}
