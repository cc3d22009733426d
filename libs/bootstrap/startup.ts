import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { AccessConfig } from './config.js';
import { ConfigGuard } from './config-guard.js';
import { RBAC_CONFIG_GUARDS } from './config/rbac-config.js';
import { createDefaultRegistry } from '../rbac/defaultPolicies.js';
import { PolicyEngine } from '../rbac/engine.js';
import { PolicyRegistry } from '../rbac/registry.js';
import { AuditDispatcher, AuditSink } from '../audit/dispatcher.js';
import { InMemoryAuditSink } from '../audit/memorySink.js';
import { PostgresAuditSink } from '../audit/postgresSink.js';
import { ContextBuilder, OrgDirectory, StaticOrgDirectory } from '../context/contextBuilder.js';
import { RbacGuard } from '../guards/rbacGuard.js';
import { AgentGuard } from '../guards/agentGuard.js';
import { DirectoryEntrySchema } from '../validation/identitySchema.js';
import { validate } from '../validation/zod-middleware.js';
import { createPool, Queryable } from '../db/pool.js';

export interface AccessCore {
    registry: PolicyRegistry;
    engine: PolicyEngine;
    audit: AuditDispatcher;
    contextBuilder: ContextBuilder;
    guard: RbacGuard;
    agentGuard: AgentGuard;
}

export interface BootstrapOverrides {
    /** Replaces the pool a postgres audit sink would open. */
    auditClient?: Queryable;
    directory?: OrgDirectory;
    registry?: PolicyRegistry;
}

const DirectoryFileSchema = z.array(DirectoryEntrySchema);

export async function loadDirectoryFile(path: string): Promise<StaticOrgDirectory> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    const entries = validate(DirectoryFileSchema, raw, `directory file ${path}`);
    logger.info({ path, entries: entries.length }, 'Org directory loaded');
    return new StaticOrgDirectory(entries);
}

function auditSink(config: AccessConfig, env: NodeJS.ProcessEnv, overrides: BootstrapOverrides): AuditSink {
    if (config.RBAC_AUDIT_SINK === 'postgres') {
        return new PostgresAuditSink(overrides.auditClient ?? createPool(config, env));
    }
    return new InMemoryAuditSink();
}

/**
 * Wire the access core for one service. Fails closed on any startup rule.
 */
export async function bootstrap(
    serviceName: string,
    config: AccessConfig,
    env: NodeJS.ProcessEnv = process.env,
    overrides: BootstrapOverrides = {}
): Promise<AccessCore> {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(RBAC_CONFIG_GUARDS, env);

    const registry = overrides.registry ?? createDefaultRegistry();
    const engine = new PolicyEngine(registry);
    const audit = new AuditDispatcher([auditSink(config, env, overrides)]);

    const directory = overrides.directory
        ?? (config.RBAC_DIRECTORY_FILE ? await loadDirectoryFile(config.RBAC_DIRECTORY_FILE) : undefined);

    const contextBuilder = new ContextBuilder({
        directory,
        cacheTtlMs: config.RBAC_DIRECTORY_CACHE_TTL_MS,
        cacheMax: config.RBAC_DIRECTORY_CACHE_MAX
    });

    const guard = new RbacGuard({ engine, audit });
    const agentGuard = new AgentGuard({ guard, audit });

    logger.info({ serviceName, auditSink: config.RBAC_AUDIT_SINK, policies: registry.size }, "Startup checks passed");

    return { registry, engine, audit, contextBuilder, guard, agentGuard };
}
