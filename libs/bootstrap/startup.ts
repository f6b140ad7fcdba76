import { logger } from "../logging/logger.js";
import { Env, IccpConfig, loadIccpConfig } from "../config/iccpConfig.js";
import { loadPolicyFile } from "../policy/policyLoader.js";
import { defaultRegistry, ResourceRegistry } from "../registry/resourceRegistry.js";
import type { LoadedPolicy } from "../policy/policyProfile.js";

export interface BootstrapResult {
    config: IccpConfig;
    loadedPolicy: LoadedPolicy;
}

/**
 * Startup checks shared by every entry point: configuration first, then the
 * policy file against the registry. Either failure is fatal to the caller.
 */
export function bootstrap(serviceName: string, env: Env = process.env, registry: ResourceRegistry = defaultRegistry): BootstrapResult {
    logger.info({ serviceName }, "Bootstrapping service");

    const config = loadIccpConfig(env);
    logger.level = config.logLevel;

    const loadedPolicy = loadPolicyFile(config.policyPath, registry);

    logger.info({
        serviceName,
        environment: config.environment,
        policyVersion: loadedPolicy.policy.policyVersion,
        policyDigest: loadedPolicy.digest,
        auditLogPath: config.auditLogPath
    }, "Startup checks passed");

    return { config, loadedPolicy };
}
