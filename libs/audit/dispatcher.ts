/**
 * Access Audit Dispatcher
 *
 * Fans decisions out to the registered sinks. Delivery is best-effort:
 * record calls return before any sink runs, and a failing sink is logged and
 * ignored. Nothing here can alter a decision that was already made.
 */

import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import type { UserContext } from '../context/identity.js';
import { roleName } from '../rbac/roles.js';
import type { AccessDecision, ScopeFilters } from '../rbac/policy.js';
import {
    AccessAuditEventType,
    AccessAuditRecord,
    AccessAuditResult,
    SENSITIVE_EVENT_TYPES
} from './schema.js';

export interface AuditSink {
    readonly name: string;
    write(record: AccessAuditRecord): Promise<void>;
}

export type AuditAlertHandler = (record: AccessAuditRecord) => Promise<void> | void;

export interface AuditEventInput {
    eventType: AccessAuditEventType;
    context: UserContext;
    resource?: string | null;
    result: AccessAuditResult;
    policyId?: string | null;
    reason?: string | null;
    scopeFilters?: ScopeFilters;
    metadata?: Record<string, unknown>;
}

export function buildAuditRecord(input: AuditEventInput): AccessAuditRecord {
    const { context } = input;

    return {
        eventId: crypto.randomUUID(),
        eventType: input.eventType,
        timestamp: new Date().toISOString(),
        actor: {
            userId: context.userId,
            role: roleName(context.role),
            teamId: context.teamId,
            departmentId: context.departmentId,
            organizationId: context.organizationId
        },
        resource: input.resource ?? null,
        result: input.result,
        policyId: input.policyId ?? null,
        reason: input.reason ?? null,
        scopeFilters: input.scopeFilters ?? {},
        session: {
            sessionId: context.sessionId ?? null,
            ipAddress: context.ipAddress ?? null,
            userAgent: context.userAgent ?? null
        },
        metadata: input.metadata ?? {}
    };
}

export class AuditDispatcher {
    private readonly sinks: AuditSink[] = [];
    private readonly alertHandlers: AuditAlertHandler[] = [];
    private readonly pending = new Set<Promise<void>>();

    constructor(sinks: Iterable<AuditSink> = []) {
        for (const sink of sinks) this.addSink(sink);
    }

    public addSink(sink: AuditSink): void {
        this.sinks.push(sink);
    }

    public addAlertHandler(handler: AuditAlertHandler): void {
        this.alertHandlers.push(handler);
    }

    /**
     * Record an access decision for the given caller.
     */
    public recordDecision(decision: AccessDecision, context: UserContext): void {
        this.recordEvent({
            eventType: decision.allowed ? 'access_granted' : 'access_denied',
            context,
            resource: decision.resource,
            result: decision.allowed ? 'success' : 'denied',
            policyId: decision.policyId,
            reason: decision.reason,
            scopeFilters: decision.scopeFilters
        });
    }

    public recordEvent(input: AuditEventInput): void {
        const record = buildAuditRecord(input);

        const delivery = this.deliver(record);
        this.pending.add(delivery);
        void delivery.finally(() => this.pending.delete(delivery));
    }

    /**
     * Wait for every delivery started so far. For shutdown and tests.
     */
    public async flush(): Promise<void> {
        await Promise.all([...this.pending]);
    }

    private async deliver(record: AccessAuditRecord): Promise<void> {
        // Let the caller's synchronous decision path finish first.
        await Promise.resolve();

        await Promise.all(this.sinks.map(async sink => {
            try {
                await sink.write(record);
            } catch (error) {
                logger.error({
                    sink: sink.name,
                    eventId: record.eventId,
                    error: error instanceof Error ? error.message : String(error)
                }, 'Audit sink failed');
            }
        }));

        if (SENSITIVE_EVENT_TYPES.has(record.eventType)) {
            for (const handler of this.alertHandlers) {
                try {
                    await handler(record);
                } catch (error) {
                    logger.error({
                        eventId: record.eventId,
                        error: error instanceof Error ? error.message : String(error)
                    }, 'Audit alert handler failed');
                }
            }
        }
    }
}
