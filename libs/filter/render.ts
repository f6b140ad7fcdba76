import { ResourceRegistry } from '../registry/resourceRegistry.js';
import { CATEGORY_ORDER } from '../registry/resources.js';
import type { RecordRow } from './masking.js';
import type { FilteredView, ResourceView } from './dataFilter.js';

/**
 * Flattens a filtered view into the text handed to the model.
 * Section order is fixed by resource category (persons, financial, grades,
 * classes, documents); ids outside the registry follow, sorted. Row keys are
 * sorted, so identical inputs always render identically.
 */
export function renderFilteredView(view: FilteredView, registry: ResourceRegistry): string {
    const sections: string[] = [];

    for (const resourceId of sectionOrder(view, registry)) {
        const resource = view.resources[resourceId];
        if (!resource) continue;
        const label = registry.tryDescribe(resourceId)?.label ?? resourceId.toUpperCase();
        sections.push([`=== ${label} ===`, ...renderSection(resource)].join('\n'));
    }

    return sections.join('\n\n');
}

function sectionOrder(view: FilteredView, registry: ResourceRegistry): string[] {
    const ordered: string[] = [];
    for (const category of CATEGORY_ORDER) {
        for (const resourceId of view.order) {
            if (registry.tryDescribe(resourceId)?.category === category) ordered.push(resourceId);
        }
    }
    const rest = view.order.filter(resourceId => !registry.has(resourceId)).sort();
    return [...ordered, ...rest];
}

function renderSection(resource: ResourceView): string[] {
    if (resource.kind === 'denied') {
        return [`  ${resource.marker}`];
    }

    const lines: string[] = [];
    if (resource.note) lines.push(`  Note: ${resource.note}`);
    if (resource.rows.length === 0) {
        lines.push('  (no records)');
    }
    for (const row of resource.rows) {
        lines.push(`  ${renderRow(row)}`);
    }
    return lines;
}

export function renderRow(row: RecordRow): string {
    return Object.keys(row)
        .sort()
        .map(key => `${key}: ${renderValue(row[key])}`)
        .join(' | ');
}

function renderValue(value: unknown): string {
    if (value === null || value === undefined) return 'n/a';
    if (Array.isArray(value)) return value.map(renderValue).join(', ');
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}
