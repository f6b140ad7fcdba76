import crypto from "crypto";
import fs from "fs";
import path from "path";
import { logger } from "../logging/logger.js";
import { IccpError } from "../errors/sanitizer.js";
import { validate } from "../validation/validator.js";
import { deepFreeze } from "../util/deepFreeze.js";
import { ResourceRegistry, defaultRegistry } from "../registry/resourceRegistry.js";
import { GRANTABLE_ROLES } from "../context/identity.js";
import { IccpPolicy, IccpPolicySchema, LoadedPolicy } from "./policyProfile.js";

export const DEFAULT_POLICY_PATH = path.resolve(process.cwd(), "policies", "iccp-policy.v1.json");

function computeHash(contents: Buffer): string {
    return crypto.createHash("sha256").update(contents).digest("hex");
}

/**
 * Rejects policies that name resources the registry does not know.
 * A typo in a policy file would otherwise silently deny a resource forever.
 */
export function assertPolicyMatchesRegistry(policy: IccpPolicy, registry: ResourceRegistry): void {
    const problems: string[] = [];

    for (const role of GRANTABLE_ROLES) {
        const rolePolicy = policy.roles[role];
        for (const resourceId of [...rolePolicy.allowedResources, ...Object.keys(rolePolicy.restrictionNotes)]) {
            if (!registry.has(resourceId)) {
                problems.push(`roles.${role} references unknown resource ${resourceId}`);
            }
        }
    }
    for (const { role, resourceId } of policy.institution.prohibitedCombinations) {
        if (!registry.has(resourceId)) {
            problems.push(`prohibitedCombinations (${role}, ${resourceId}) references unknown resource`);
        }
    }

    if (problems.length > 0) {
        throw new IccpError("POLICY_INVALID", `Policy does not match resource registry: ${problems.join("; ")}`, { problems }, "CFG");
    }
}

/**
 * Validates a raw policy object and returns a frozen copy.
 */
export function parsePolicy(raw: unknown, registry: ResourceRegistry = defaultRegistry): IccpPolicy {
    const policy: IccpPolicy = validate(IccpPolicySchema, raw, "IccpPolicy", "POLICY_INVALID", "CFG");
    assertPolicyMatchesRegistry(policy, registry);
    return deepFreeze(policy);
}

/**
 * Reads, validates and freezes a policy file.
 * Fails closed: a missing, unparsable or inconsistent file is an IccpError.
 */
export function loadPolicyFile(policyPath: string = DEFAULT_POLICY_PATH, registry: ResourceRegistry = defaultRegistry): LoadedPolicy {
    const absolutePath = path.resolve(process.cwd(), policyPath);
    if (!fs.existsSync(absolutePath)) {
        throw new IccpError("POLICY_INVALID", `Policy file missing at ${absolutePath}.`, undefined, "CFG");
    }

    const contents = fs.readFileSync(absolutePath);
    let raw: unknown;
    try {
        raw = JSON.parse(contents.toString("utf-8"));
    } catch (error) {
        throw new IccpError("POLICY_INVALID", `Policy file at ${absolutePath} is not valid JSON.`, { error }, "CFG", { cause: error });
    }

    const policy = parsePolicy(raw, registry);
    const digest = computeHash(contents);

    logger.info({ policyVersion: policy.policyVersion, policyPath: absolutePath, digest }, "Policy loaded");

    return Object.freeze({ policy, sourcePath: absolutePath, digest });
}
