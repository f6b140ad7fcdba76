/**
 * ICCP Resource Catalog
 *
 * Fixed table of every institutional resource the engine mediates.
 * allowedRoles is the institution-level allow-list: a role missing here can
 * never be granted the resource, whatever the role policy says.
 */

import { Role } from '../context/identity.js';

export type Sensitivity = 'PII' | 'FERPA' | 'FERPA-Financial' | 'Institutional' | 'Internal';

export type ResourceCategory = 'persons' | 'financial' | 'grades' | 'classes' | 'documents';

export interface ResourceDescriptor {
    readonly resourceId: string;
    /** Source system label */
    readonly origin: string;
    readonly sensitivity: Sensitivity;
    readonly ttlSeconds: number;
    readonly allowedRoles: readonly Role[];
    readonly category: ResourceCategory;
    /** Section heading used in rendered context */
    readonly label: string;
    /** Field names rows of this resource may carry */
    readonly fields: readonly string[];
    /** Row field that names the owning person, when rows are owned */
    readonly ownerField?: string;
}

export const RESOURCE_PERSONS = 'persons';
export const RESOURCE_FINANCIAL = 'financial_information';
export const RESOURCE_GRADES = 'grades';
export const RESOURCE_CLASSES = 'classes';
export const RESOURCE_DOCUMENTS = 'documents';

/** Rendering order of sections in the flattened context text. */
export const CATEGORY_ORDER: readonly ResourceCategory[] = ['persons', 'financial', 'grades', 'classes', 'documents'];

export const RESOURCE_TABLE: readonly ResourceDescriptor[] = [
    {
        resourceId: RESOURCE_PERSONS,
        origin: 'InstitutionSIS',
        sensitivity: 'PII',
        ttlSeconds: 300,
        allowedRoles: [Role.Admin, Role.Teacher, Role.Student],
        category: 'persons',
        label: 'PERSONS',
        fields: ['person_id', 'name', 'role', 'email', 'ssn', 'major', 'year', 'department', 'title'],
        ownerField: 'person_id',
    },
    {
        resourceId: RESOURCE_FINANCIAL,
        origin: 'InstitutionSIS',
        sensitivity: 'FERPA-Financial',
        ttlSeconds: 120,
        allowedRoles: [Role.Admin, Role.Teacher, Role.Student],
        category: 'financial',
        label: 'FINANCIAL INFORMATION',
        fields: [
            'person_id', 'type', 'amount_due', 'amount_paid', 'balance', 'scholarship',
            'annual_salary', 'pay_frequency', 'benefits', 'bank_account', 'status',
        ],
        ownerField: 'person_id',
    },
    {
        resourceId: RESOURCE_GRADES,
        origin: 'InstitutionSIS',
        sensitivity: 'FERPA',
        ttlSeconds: 300,
        allowedRoles: [Role.Admin, Role.Teacher],
        category: 'grades',
        label: 'GRADES',
        fields: ['student_id', 'class_id', 'midterm', 'final', 'grade', 'attendance_rate'],
        ownerField: 'student_id',
    },
    {
        resourceId: RESOURCE_CLASSES,
        origin: 'InstitutionSIS',
        sensitivity: 'Institutional',
        ttlSeconds: 600,
        allowedRoles: [Role.Admin, Role.Teacher, Role.Student],
        category: 'classes',
        label: 'CLASSES',
        fields: ['class_id', 'name', 'teacher_id', 'teacher_name', 'schedule', 'room', 'credits', 'enrolled_students'],
    },
    {
        resourceId: RESOURCE_DOCUMENTS,
        origin: 'InstitutionDocumentIndex',
        sensitivity: 'Internal',
        ttlSeconds: 900,
        allowedRoles: [Role.Admin, Role.Teacher, Role.Student],
        category: 'documents',
        label: 'DOCUMENTS',
        fields: ['document_id', 'title', 'source', 'excerpt'],
    },
];
