import type { AuditSink } from './dispatcher.js';
import type { AccessAuditEventType, AccessAuditRecord } from './schema.js';

/**
 * Process-local sink. Keeps the most recent `capacity` records.
 */
export class InMemoryAuditSink implements AuditSink {
    public readonly name = 'memory';
    private readonly records: AccessAuditRecord[] = [];

    constructor(private readonly capacity = 10_000) { }

    public async write(record: AccessAuditRecord): Promise<void> {
        this.records.push(record);
        if (this.records.length > this.capacity) {
            this.records.splice(0, this.records.length - this.capacity);
        }
    }

    public all(): readonly AccessAuditRecord[] {
        return [...this.records];
    }

    public byType(eventType: AccessAuditEventType): AccessAuditRecord[] {
        return this.records.filter(record => record.eventType === eventType);
    }

    public clear(): void {
        this.records.length = 0;
    }
}
