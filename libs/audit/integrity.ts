import fs from "fs";
import { AuditLogEntrySchema } from "./schema.js";
import { containsSensitivePattern } from "./redaction.js";

export interface AuditLogVerification {
    valid: boolean;
    entries: number;
    violationIndex?: number;
    reason?: string;
}

/**
 * Audit Log Verifier
 * Replays a JSONL audit file and stops at the first line that is not a
 * well-formed entry or still carries a sensitive-pattern match.
 */
export function verifyAuditLog(auditFilePath: string): AuditLogVerification {
    if (!fs.existsSync(auditFilePath)) {
        return { valid: true, entries: 0 }; // Nothing written yet
    }

    const lines = fs.readFileSync(auditFilePath, "utf8").split("\n");
    let entries = 0;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (!line || line.trim() === "") continue;

        let parsed: unknown;
        try {
            parsed = JSON.parse(line);
        } catch (e) {
            const errorMessage = e instanceof Error ? e.message : "Parse error";
            return { valid: false, entries, violationIndex: i, reason: `Format error at line ${i + 1}: ${errorMessage}` };
        }

        const result = AuditLogEntrySchema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues.map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
            return { valid: false, entries, violationIndex: i, reason: `Schema violation at line ${i + 1}: ${issues.join("; ")}` };
        }

        if (containsSensitivePattern(line)) {
            return { valid: false, entries, violationIndex: i, reason: `Sensitive pattern at line ${i + 1} (trace ${result.data.traceId})` };
        }

        entries += 1;
    }

    return { valid: true, entries };
}
