/**
 * Looseleaf Ambient Store Context (with unctx)
 * ============================================
 *
 * Optional composition-style access to a store without passing it through
 * every function. `createStoreWithContext` creates a store and registers it
 * as the active context; the `use*` hooks read it back from anywhere in
 * synchronous setup code.
 *
 * --- ASYNC USAGE ---
 * As with all `unctx` contexts, the store is only available synchronously.
 * Inside an async function, read it into a local before the first `await`.
 *
 * @dependency unctx
 */

import { getContext } from 'unctx';

import { createModelStore, type ModelInstance, type ModelOptions, type ModelStore } from './index';
import { createClient, type ClientOptions, type ModelClient } from './request';
import {
  createResource,
  type ResourceOptions,
  type ResourceRequest,
  type ResourceReturn
} from './resource';

// --- UNCTX SETUP ---

const storeContext = getContext<ModelStore>('looseleaf-store-context');

// --- CORE API ---

/**
 * Creates a store and makes it the active context, replacing any store set
 * earlier.
 */
export function createStoreWithContext(options?: ModelOptions): ModelStore {
  const store = createModelStore(options);
  storeContext.set(store, true);
  return store;
}

/**
 * The active store. Throws when no store has been set.
 */
export function useStore(): ModelStore {
  return storeContext.use();
}

/**
 * The active store, or `null` outside of a context.
 */
export function tryUseStore(): ModelStore | null {
  return storeContext.tryUse() ?? null;
}

/**
 * Runs `fn` with `store` as the active context. Only valid while no store is
 * set through `createStoreWithContext`; unctx reports a context conflict
 * otherwise.
 */
export function withStore<T>(store: ModelStore, fn: () => T): T {
  return storeContext.call(store, fn);
}

export function releaseStoreContext(): void {
  storeContext.unset();
}

// --- HOOKS ---

export function useModel(name: string): ModelInstance {
  return useStore().model(name);
}

export function useClient(options?: ClientOptions): ModelClient {
  return createClient(useStore(), options);
}

export function useResource(
  request: ResourceRequest,
  options?: ResourceOptions & ClientOptions
): ResourceReturn {
  return createResource(useClient(options), request, options);
}
