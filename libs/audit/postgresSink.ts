import type { Queryable } from '../db/pool.js';
import { logger } from '../logging/logger.js';
import type { AuditSink } from './dispatcher.js';
import { GENESIS_HASH, chainRecord } from './integrity.js';
import type { AccessAuditRecord } from './schema.js';

export const AUDIT_TABLE = 'rbac_audit_log';

/**
 * Append-only PostgreSQL sink with hash chaining.
 * The record column is `json` (not `jsonb`) so the stored text keeps its key
 * order and the chain can be re-verified from what is read back.
 */
export class PostgresAuditSink implements AuditSink {
    public readonly name = 'postgres';
    private lastHash: string | null = null;
    private tail: Promise<void> = Promise.resolve();

    constructor(private readonly client: Queryable) { }

    /**
     * Writes are serialized: each record must see its predecessor's hash.
     */
    public write(record: AccessAuditRecord): Promise<void> {
        const next = this.tail.then(() => this.append(record));
        // A failed append must not wedge the ones queued behind it.
        this.tail = next.catch(() => undefined);
        return next;
    }

    private async ensureChainInitialized(): Promise<string> {
        if (this.lastHash !== null) return this.lastHash;

        const result = await this.client.query<{ last_hash: string | null }>(
            `SELECT record->'integrity'->>'hash' AS last_hash
             FROM ${AUDIT_TABLE}
             ORDER BY seq DESC
             LIMIT 1`
        );

        this.lastHash = result.rows[0]?.last_hash ?? GENESIS_HASH;
        return this.lastHash;
    }

    private async append(record: AccessAuditRecord): Promise<void> {
        const prevHash = await this.ensureChainInitialized();
        const chained = chainRecord(record, prevHash);

        await this.client.query(
            `INSERT INTO ${AUDIT_TABLE} (event_id, event_type, user_id, resource, result, record, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7)`,
            [
                chained.eventId,
                chained.eventType,
                chained.actor.userId,
                chained.resource,
                chained.result,
                JSON.stringify(chained),
                chained.timestamp
            ]
        );

        this.lastHash = chained.integrity.hash;

        logger.debug({
            auditEvent: chained.eventType,
            eventId: chained.eventId,
            integrityHash: chained.integrity.hash
        }, 'Audit record committed');
    }
}
