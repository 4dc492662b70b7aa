import { buildOperationCatalog } from './operationCatalog';
import type { OperationCatalogOptions, OperationEntry } from './operationCatalog';
import type { ApiDescriptor } from './schemaResolution';

/** A route handler used as a transition identity. */
export type TransitionHandle = (...args: never[]) => unknown;

export type DescriptorSource = () => ApiDescriptor;

/**
 * Per-application cache of the operation catalog. The table is built on the
 * first lookup and reused until `invalidate()` is called.
 */
export class TransitionCatalog {
  private table: ReadonlyMap<string, OperationEntry> | null = null;
  private readonly handles = new Map<TransitionHandle, string>();

  constructor(
    private readonly source: DescriptorSource,
    private readonly options: OperationCatalogOptions = {}
  ) {}

  entries(): ReadonlyMap<string, OperationEntry> {
    if (!this.table) {
      this.table = buildOperationCatalog(this.source(), this.options);
    }
    return this.table;
  }

  get(operationId: string): OperationEntry | undefined {
    return this.entries().get(operationId);
  }

  registerHandle(handle: TransitionHandle, operationId: string): void {
    this.handles.set(handle, operationId);
  }

  operationIdFor(handle: TransitionHandle): string | undefined {
    return this.handles.get(handle);
  }

  invalidate(): void {
    this.table = null;
  }
}
