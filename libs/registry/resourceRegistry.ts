import { IccpError } from '../errors/sanitizer.js';
import { RESOURCE_TABLE, ResourceDescriptor } from './resources.js';

export class UnknownResourceError extends IccpError {
    constructor(public readonly resourceId: string) {
        super('UNKNOWN_RESOURCE', `Unknown resource: ${resourceId}`, { resourceId }, 'SEC');
        this.name = 'UnknownResourceError';
    }
}

/**
 * Read-only catalog of resource descriptors.
 * Built once at process start; descriptors are frozen and never mutated.
 */
export class ResourceRegistry {
    private readonly descriptors: ReadonlyMap<string, ResourceDescriptor>;

    constructor(table: readonly ResourceDescriptor[] = RESOURCE_TABLE) {
        const map = new Map<string, ResourceDescriptor>();
        for (const descriptor of table) {
            if (map.has(descriptor.resourceId)) {
                throw new IccpError(
                    'POLICY_INVALID',
                    `Duplicate resource descriptor: ${descriptor.resourceId}`,
                    undefined,
                    'CFG'
                );
            }
            map.set(descriptor.resourceId, Object.freeze({
                ...descriptor,
                allowedRoles: Object.freeze([...descriptor.allowedRoles]),
                fields: Object.freeze([...descriptor.fields]),
            }));
        }
        this.descriptors = map;
    }

    /**
     * Fails with UnknownResourceError when the id has no descriptor.
     */
    public describe(resourceId: string): ResourceDescriptor {
        const descriptor = this.descriptors.get(resourceId);
        if (!descriptor) {
            throw new UnknownResourceError(resourceId);
        }
        return descriptor;
    }

    public tryDescribe(resourceId: string): ResourceDescriptor | undefined {
        return this.descriptors.get(resourceId);
    }

    public has(resourceId: string): boolean {
        return this.descriptors.has(resourceId);
    }

    public list(): ResourceDescriptor[] {
        return [...this.descriptors.values()];
    }

    /** Every registered resource id, in table order. */
    public universe(): string[] {
        return [...this.descriptors.keys()];
    }
}

export const defaultRegistry = new ResourceRegistry();
