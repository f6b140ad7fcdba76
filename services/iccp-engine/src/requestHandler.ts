import { buildIdentityScope } from "../../../libs/context/identity.js";
import { ErrorSanitizer } from "../../../libs/errors/sanitizer.js";
import { createValidator } from "../../../libs/validation/validator.js";
import { MediationRequestSchema } from "../../../libs/validation/requestSchema.js";
import type { IccpEngine } from "../../../libs/engine/iccpEngine.js";

const validateRequest = createValidator(MediationRequestSchema, "INVALID_REQUEST", "SEC");

export type MediationResponse =
    | {
        ok: true;
        traceId: string;
        accessLevel: string;
        decision: string;
        renderedContext: string;
        maskedFields: readonly string[];
        deniedResources: readonly string[];
        policyHash: string;
    }
    | {
        ok: false;
        error: { code: string; message: string; incidentId: string };
    };

export interface ResponseWriter {
    write(line: string): unknown;
}

/**
 * Answers every non-blank input line with exactly one JSON line on the
 * writer, and writes nothing else there. Stops early once the engine's audit
 * pipeline no longer accepts entries. Resolves with the number of responses.
 */
export async function serveLines(engine: IccpEngine, lines: AsyncIterable<string>, output: ResponseWriter): Promise<number> {
    let answered = 0;
    for await (const line of lines) {
        if (line.trim() === "") continue;
        if (!engine.pipeline.isAccepting) break;
        output.write(JSON.stringify(handleRequestLine(engine, line)) + "\n");
        answered += 1;
    }
    return answered;
}

/**
 * Mediates one JSON request line. Failures come back as a sanitized error
 * object carrying the incident id; internals stay in the log.
 */
export function handleRequestLine(engine: IccpEngine, line: string): MediationResponse {
    try {
        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch {
            raw = undefined;
        }
        const request = validateRequest(raw, "MediationRequest");
        const identity = buildIdentityScope(request.identity);

        const result = engine.process({
            identity,
            requestedResources: request.requestedResources,
            records: request.records,
            traceId: request.traceId,
        });

        return {
            ok: true,
            traceId: result.traceId,
            accessLevel: result.accessLevel,
            decision: result.decision,
            renderedContext: result.renderedContext,
            maskedFields: result.maskedFields,
            deniedResources: result.deniedResources,
            policyHash: result.contextPacket.policyHash,
        };
    } catch (err) {
        const safe = ErrorSanitizer.sanitize(err, "RequestHandler");
        return {
            ok: false,
            error: { code: safe.code, message: safe.publicMessage, incidentId: safe.incidentId },
        };
    }
}
