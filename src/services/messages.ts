import { z } from 'zod';
import {
    AllocationChange,
    isResourceType,
    Priority,
    ReleaseResult,
    ResourceAllocation,
    ResourceRequest,
    ResourceType
} from '../types/resources';
import { ValidationError } from './errors';

/**
 * Wire formats for the resource topics. Payloads use snake_case on the wire
 * and are validated here before anything reaches the manager.
 */

export const Topics = {
    REQUEST: 'resource.request',
    RELEASE: 'resource.release',
    ALLOCATION: 'resource.allocation',
    RELEASED: 'resource.released',
    COMPONENT_STARTED: 'component.started',
    COMPONENT_STOPPED: 'component.stopped',
    requestResponse: (consumerId: string) => `resource.response.${consumerId}`,
    releaseResponse: (consumerId: string) => `resource.release.response.${consumerId}`
} as const;

const consumerIdField = z
    .string({ required_error: 'Required', invalid_type_error: 'Expected a string' })
    .trim()
    .min(1, 'Must not be empty');

const resourceTypeField = z
    .string({ required_error: 'Required', invalid_type_error: 'Expected a string' })
    .transform((value, ctx): ResourceType => {
        const normalized = value.trim().toUpperCase();
        if (!isResourceType(normalized)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown resource type "${value}"` });
            return z.NEVER;
        }
        return normalized;
    });

const priorityField = z.preprocess(
    value => (typeof value === 'string' ? value.toUpperCase() : value),
    z.nativeEnum(Priority)
);

const requestSchema = z.object({
    request_id: z.string().optional(),
    consumer_id: consumerIdField,
    resource_type: resourceTypeField,
    requested_amount: z
        .number({ required_error: 'Required', invalid_type_error: 'Expected a number' })
        .finite()
        .nonnegative(),
    priority: priorityField.default(Priority.NORMAL),
    reason: z.string().optional()
});

const releaseSchema = z.object({
    request_id: z.string().optional(),
    consumer_id: consumerIdField,
    resource_type: resourceTypeField
});

const lifecycleSchema = z.object({
    consumer_id: consumerIdField
});

export interface ResourceRequestMessage {
    requestId?: string;
    request: ResourceRequest;
}

export interface ResourceReleaseMessage {
    requestId?: string;
    consumerId: string;
    resourceType: ResourceType;
}

export interface ResourceRequestReply {
    request_id?: string;
    consumer_id?: string;
    resource_type?: string;
    requested_amount: number;
    allocated_amount: number;
    success: boolean;
    message: string;
}

export interface ResourceReleaseReply {
    request_id?: string;
    consumer_id?: string;
    resource_type?: string;
    success: boolean;
    message: string;
}

export interface AllocationNotification {
    consumer_id: string;
    resource_type: ResourceType;
    allocation: number;
    previous_allocation: number;
}

const requestReplySchema = z.object({
    request_id: z.string().optional(),
    consumer_id: z.string().optional(),
    resource_type: z.string().optional(),
    requested_amount: z.number(),
    allocated_amount: z.number().nonnegative(),
    success: z.boolean(),
    message: z.string()
});

const releaseReplySchema = z.object({
    request_id: z.string().optional(),
    consumer_id: z.string().optional(),
    resource_type: z.string().optional(),
    success: z.boolean(),
    message: z.string()
});

const allocationNotificationSchema = z.object({
    consumer_id: z.string(),
    resource_type: resourceTypeField,
    allocation: z.number().nonnegative(),
    previous_allocation: z.number().nonnegative()
});

function toValidationError(error: z.ZodError): ValidationError {
    const issue = error.issues[0];
    const field = issue.path.join('.');
    return new ValidationError(field ? `Invalid ${field}: ${issue.message}` : issue.message, field || undefined);
}

function parseWith<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
    const result = schema.safeParse(payload);
    if (!result.success) {
        throw toValidationError(result.error);
    }
    return result.data;
}

export function parseRequestMessage(payload: unknown): ResourceRequestMessage {
    const message = parseWith(requestSchema, payload);
    return {
        requestId: message.request_id,
        request: {
            consumerId: message.consumer_id,
            resourceType: message.resource_type,
            requestedAmount: message.requested_amount,
            priority: message.priority,
            reason: message.reason
        }
    };
}

export function parseReleaseMessage(payload: unknown): ResourceReleaseMessage {
    const message = parseWith(releaseSchema, payload);
    return {
        requestId: message.request_id,
        consumerId: message.consumer_id,
        resourceType: message.resource_type
    };
}

export function parseLifecycleMessage(payload: unknown): string {
    return parseWith(lifecycleSchema, payload).consumer_id;
}

export function parseRequestReply(payload: unknown): ResourceRequestReply {
    return parseWith(requestReplySchema, payload);
}

export function parseReleaseReply(payload: unknown): ResourceReleaseReply {
    return parseWith(releaseReplySchema, payload);
}

export function parseAllocationNotification(payload: unknown): AllocationNotification {
    return parseWith(allocationNotificationSchema, payload);
}

function payloadField(payload: unknown, key: string): unknown {
    if (typeof payload !== 'object' || payload === null) return undefined;
    return Object.entries(payload).find(([name]) => name === key)?.[1];
}

/**
 * Best-effort extraction of identifying fields from a payload that failed validation,
 * so the failure reply can still be routed and correlated.
 */
export function describePayload(payload: unknown): { request_id?: string; consumer_id?: string; resource_type?: string } {
    const asString = (value: unknown) => (typeof value === 'string' ? value : undefined);
    return {
        request_id: asString(payloadField(payload, 'request_id')),
        consumer_id: asString(payloadField(payload, 'consumer_id')),
        resource_type: asString(payloadField(payload, 'resource_type'))
    };
}

export function payloadAmount(payload: unknown): number {
    const amount = payloadField(payload, 'requested_amount');
    return typeof amount === 'number' && Number.isFinite(amount) ? amount : 0;
}

export function toRequestReply(allocation: ResourceAllocation, requestId?: string): ResourceRequestReply {
    return {
        request_id: requestId,
        consumer_id: allocation.consumerId,
        resource_type: allocation.resourceType,
        requested_amount: allocation.requestedAmount,
        allocated_amount: allocation.allocatedAmount,
        success: allocation.success,
        message: allocation.message
    };
}

export function toReleaseReply(result: ReleaseResult, requestId?: string): ResourceReleaseReply {
    return {
        request_id: requestId,
        consumer_id: result.consumerId,
        resource_type: result.resourceType,
        success: result.success,
        message: result.message
    };
}

export function toAllocationNotification(change: AllocationChange): AllocationNotification {
    return {
        consumer_id: change.consumerId,
        resource_type: change.resourceType,
        allocation: change.allocation,
        previous_allocation: change.previousAllocation
    };
}
