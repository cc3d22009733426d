import { AsyncLocalStorage } from 'node:async_hooks';
import { UserContext } from "./identity.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary (the context middleware) calls run().
 * Downstream code only calls get() or tryGet().
 */

const storage = new AsyncLocalStorage<UserContext>();

export class RequestContext {
    /**
     * Establish the caller scope for a request or job.
     * Supports both sync and async functions.
     */
    public static run<T>(
        context: UserContext,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze(context), fn);
    }

    /**
     * Get the current caller context.
     * FAIL-CLOSED: Throws if called outside run() scope.
     */
    public static get(): UserContext {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error("MISSING_REQUEST_CONTEXT: No caller scope established - access denied");
        }
        return ctx;
    }

    public static tryGet(): UserContext | undefined {
        return storage.getStore();
    }
}
