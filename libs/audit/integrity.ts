import { AccessAuditRecord, ChainedAuditRecord } from "./schema.js";
import crypto from "crypto";

export const GENESIS_HASH = "0".repeat(64);

/**
 * Link a record to its predecessor: hash = SHA-256(JSON(record) || prevHash).
 */
export function chainRecord(record: AccessAuditRecord, prevHash: string): ChainedAuditRecord {
    const hash = crypto.createHash("sha256")
        .update(JSON.stringify(record) + prevHash)
        .digest("hex");

    return { ...record, integrity: { prevHash, hash } };
}

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain of audit records, oldest first.
 */
export function verifyAuditChain(records: readonly ChainedAuditRecord[]): {
    valid: boolean;
    violationIndex?: number;
    reason?: string
} {
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        // Remove integrity field to reconstruct the content that was hashed
        const { integrity: _integrity, ...contentsOnly } = record;
        void _integrity;
        const computedHash = crypto.createHash("sha256")
            .update(JSON.stringify(contentsOnly) + record.integrity.prevHash)
            .digest("hex");

        if (computedHash !== record.integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${record.integrity.hash}`
            };
        }

        lastHash = record.integrity.hash;
    }

    return { valid: true };
}
