import path from "path";
import { loadIccpConfig } from "../../libs/config/iccpConfig.js";
import { verifyAuditLog } from "../../libs/audit/integrity.js";

/**
 * Audit log check: every line is a well-formed entry and none still carries
 * a sensitive pattern. Path from argv, else the configured audit log.
 */
function run(): number {
    const target = process.argv[2] ? path.resolve(process.argv[2]) : loadIccpConfig().auditLogPath;
    console.log(`--- VERIFYING AUDIT LOG: ${target} ---`);

    const result = verifyAuditLog(target);
    if (!result.valid) {
        console.error(`FAILURE: ${result.reason}`);
        return 1;
    }

    console.log(`SUCCESS: ${result.entries} entries verified.`);
    return 0;
}

process.exitCode = run();
