import type { JsonType } from './type';
import type { Document } from './types';

export type ContextPayload = { data: Document } | { batch: readonly Document[] };

/**
 * Per-call traversal state: the document (or batch) being synced, its place in the
 * parent/child graph, and whether absent fields mean "not specified".
 *
 * A child borrows its parent; contexts are discarded when the call returns.
 */
export class SyncContext {
  readonly parent?: SyncContext;
  readonly type: JsonType;
  readonly batch?: readonly Document[];
  readonly partial: boolean;
  /** The document currently being built; advances while a batch is iterated. */
  data?: Document;
  /** Position in `batch`, -1 until iteration starts. */
  index = -1;
  /** Ancestor documents, nearest first. */
  readonly parents: readonly Document[];
  readonly parentContexts: readonly SyncContext[];
  readonly root: Document | readonly Document[];
  readonly rootContext: SyncContext;

  private constructor(parent: SyncContext | undefined, type: JsonType, payload: ContextPayload, partial: boolean) {
    this.parent = parent;
    this.type = type;
    this.partial = partial;
    if ('data' in payload) this.data = payload.data;
    else this.batch = payload.batch;

    if (parent) {
      this.parents = parent.data ? [parent.data, ...parent.parents] : parent.parents;
      this.parentContexts = [parent, ...parent.parentContexts];
      this.root = parent.root;
      this.rootContext = parent.rootContext;
    } else {
      this.parents = [];
      this.parentContexts = [];
      this.root = 'data' in payload ? payload.data : payload.batch;
      this.rootContext = this;
    }
  }

  static forDocument(type: JsonType, data: Document, partial = false): SyncContext {
    return new SyncContext(undefined, type, { data }, partial);
  }

  static forBatch(type: JsonType, batch: readonly Document[], partial = false): SyncContext {
    return new SyncContext(undefined, type, { batch }, partial);
  }

  /** Context for a referenced document or batch; `partial` is inherited. */
  child(type: JsonType, payload: ContextPayload): SyncContext {
    return new SyncContext(this, type, payload, this.partial);
  }

  get depth(): number {
    return this.parentContexts.length;
  }
}
