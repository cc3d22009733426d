import { z } from 'zod';
import { ACCESS_LEVELS, RESOURCE_TYPES } from '../rbac/resources.js';

const ResourceAttributesSchema = z.object({
    teamId: z.string().nullable().optional(),
    departmentId: z.string().nullable().optional(),
    ownerId: z.string().nullable().optional(),
    projectId: z.string().nullable().optional(),
    hierarchyDepth: z.number().int().nonnegative().optional(),
    onboardingVisible: z.boolean().optional(),
}).catchall(z.unknown());

export const AccessCheckRequestSchema = z.object({
    resource: z.enum(RESOURCE_TYPES),
    level: z.enum(ACCESS_LEVELS).default('read'),
    attributes: ResourceAttributesSchema.default({}),
}).strict();

export type AccessCheckRequest = z.infer<typeof AccessCheckRequestSchema>;

const ChatSourceSchema = z.object({
    type: z.string().nullable().optional(),
    title: z.string().optional(),
    team_id: z.string().nullable().optional(),
    department_id: z.string().nullable().optional(),
    owner_id: z.string().nullable().optional(),
    access_denied: z.boolean().optional(),
}).passthrough();

export const ChatFilterRequestSchema = z.object({
    response: z.string(),
    sources: z.array(ChatSourceSchema).default([]),
}).strict();

export type ChatFilterRequest = z.infer<typeof ChatFilterRequestSchema>;
