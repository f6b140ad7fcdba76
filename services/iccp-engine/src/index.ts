import readline from "node:readline";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { createIccpEngine } from "../../../libs/engine/createEngine.js";
import { serveLines } from "./requestHandler.js";

/**
 * Reads one JSON mediation request per stdin line and answers with one JSON
 * line on stdout; logs go to stderr. End of input or SIGINT/SIGTERM drains
 * the audit queue before exit.
 */
async function main() {
    const { config, loadedPolicy } = bootstrap("iccp-engine");
    const engine = createIccpEngine(config, loadedPolicy.policy);

    logger.info({ policyVersion: engine.policyVersion }, "ICCP engine ready");

    const input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
    let shuttingDown: Promise<void> | null = null;

    const shutdown = (reason: string): Promise<void> => {
        if (shuttingDown) return shuttingDown;
        logger.info({ reason }, "Shutting down; draining audit queue");
        input.close();
        const drain = engine.shutdown();
        shuttingDown = drain;
        return drain;
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            shutdown(signal).then(
                () => process.exit(0),
                err => {
                    logger.fatal({ err }, "Audit drain failed");
                    process.exit(1);
                }
            );
        });
    }

    const answered = await serveLines(engine, input, process.stdout);
    logger.info({ answered }, "Input closed");

    await shutdown("end of input");
    const failures = engine.pipeline.failures();
    if (failures.length > 0) {
        logger.warn({ failures: failures.length }, "Audit sink failures recorded during run");
    }
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
