import { z } from 'zod';

/**
 * Claims the context builder reads from an already-verified token.
 * Other registered claims (exp, iat, aud, ...) are allowed through and ignored.
 */
export const TokenPayloadSchema = z.object({
    sub: z.string().trim().min(1),
    role: z.string().optional(),
    team_id: z.string().optional(),
    department_id: z.string().optional(),
    org_id: z.string().optional(),
    email: z.string().optional(),
    name: z.string().optional(),
}).passthrough();

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

/**
 * One person as the org directory reports them.
 */
export const DirectoryEntrySchema = z.object({
    userId: z.string().min(1),
    role: z.string().optional(),
    teamId: z.string().optional(),
    departmentId: z.string().optional(),
    organizationId: z.string().optional(),
    email: z.string().optional(),
    name: z.string().optional(),
    managerId: z.string().optional(),
    directReports: z.array(z.string()).default([]),
    projectIds: z.array(z.string()).default([]),
});

export type DirectoryEntry = z.infer<typeof DirectoryEntrySchema>;
export type DirectoryEntryInput = z.input<typeof DirectoryEntrySchema>;
