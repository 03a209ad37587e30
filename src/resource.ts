// src/resource.ts

import type { ModelInstance } from './index';
import type { JsonObject } from './json';
import type { ModelClient, RequestDescriptor, RequestError, RequestResult } from './request';

// --- TYPE DEFINITIONS ---

/** The observable state of a resource. */
export interface ResourceState {
  /** The model the latest successful response was mapped into. */
  readonly model: ModelInstance;
  readonly loading: boolean;
  readonly error: RequestError | null;
}

/** A request bound to the model its responses are mapped into. */
export interface ResourceRequest extends Omit<RequestDescriptor, 'model'> {
  model: ModelInstance | string;
}

/** Options for configuring a resource. */
export interface ResourceOptions {
  /** Fetch as soon as the resource is created. Defaults to `true`. */
  immediate?: boolean;
}

export interface Resource {
  read(): ResourceState;
  subscribe(listener: (state: ResourceState) => void): () => void;
  /** Settles when the initial fetch completes; `undefined` if none was started. */
  readonly ready: Promise<RequestResult | undefined>;
}

/** The actions object returned by `createResource`. */
export interface ResourceActions {
  /** Overwrite the model without calling the server. */
  mutate: (json: JsonObject | JsonObject[]) => void;
  /** Re-run the request. */
  refetch: () => Promise<RequestResult>;
}

/** The tuple returned by `createResource`. */
export type ResourceReturn = [Resource, ResourceActions];

// --- CORE IMPLEMENTATION: createResource ---

export function createResource(
  client: ModelClient,
  request: ResourceRequest,
  options: ResourceOptions = {}
): ResourceReturn {
  const { model: target, ...descriptor } = request;
  const model = typeof target === 'string' ? client.store.model(target) : target;
  const immediate = options.immediate ?? true;

  let state: ResourceState = { model, loading: immediate, error: null };
  const listeners = new Set<(state: ResourceState) => void>();

  const setState = (patch: Partial<Omit<ResourceState, 'model'>>) => {
    state = { ...state, ...patch };
    for (const listener of [...listeners]) {
      listener(state);
    }
  };

  let fetchId = 0;

  // The request is sent without a model; only the latest response is mapped
  const load = async (): Promise<RequestResult> => {
    const currentFetchId = ++fetchId;
    setState({ loading: true, error: null });

    const result = await client.execute(descriptor);

    if (currentFetchId === fetchId) {
      if (result.ok) {
        model.map(result.data);
        setState({ loading: false, error: null });
      } else {
        setState({ loading: false, error: result.error });
      }
    }
    return result;
  };

  const ready = immediate ? load() : Promise.resolve(undefined);

  const resource: Resource = {
    read: () => state,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    ready
  };

  const actions: ResourceActions = {
    mutate: (json) => {
      model.map(json);
      setState({ loading: false, error: null });
    },
    refetch: () => load()
  };

  return [resource, actions];
}
