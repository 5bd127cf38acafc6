import type { BaseCharacteristic, ParseOptions } from './characteristics/base.js';
import { DecodeContext } from './characteristics/context.js';
import { createTrace, failureResult } from './diagnostics.js';
import { DependencyCycleError, UuidResolutionError } from './errors.js';
import type { DecodedResult, DependencyDeclaration } from './interfaces/characteristic.js';
import { createLogger, type Logger } from './logger.js';
import type { CharacteristicRegistry } from './registry/registry.js';
import { BluetoothUuid } from './uuid.js';

/** Payloads keyed by identifier or alias. */
export type BatchInput = Readonly<Record<string, Uint8Array>>;
export type BatchResult = Record<string, DecodedResult<unknown>>;

interface BatchNode {
  readonly input: string;
  readonly key: string;
  readonly raw: Uint8Array;
  readonly characteristic: BaseCharacteristic<unknown>;
}

/**
 * Decodes several payloads at once, in dependency order.
 *
 * Edges come from each type's declared required and optional dependencies,
 * restricted to identifiers present in the batch. Dependencies outside the
 * batch are looked up in the caller's context. A cycle fails the whole batch
 * before anything is decoded; every other failure stays in its own entry.
 */
export class BatchDecoder {
  private readonly log: Logger;

  constructor(
    private readonly registry: CharacteristicRegistry,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('Batch');
  }

  decode(input: BatchInput, context?: DecodeContext, options: ParseOptions = {}): BatchResult {
    const results: BatchResult = {};
    const nodes: BatchNode[] = [];

    for (const [id, raw] of Object.entries(input)) {
      const characteristic = this.registry.create(id);
      if (!characteristic) {
        results[id] = this.unresolved(id, raw);
        continue;
      }
      nodes.push({ input: id, key: characteristic.uuid.longForm, raw, characteristic });
    }

    const ordered = this.order(nodes);
    this.log.debug(`Batch order: ${ordered.map((n) => n.characteristic.name).join(' -> ') || '(empty)'}`);

    const ctx = context?.clone() ?? new DecodeContext();
    for (const node of ordered) {
      const { characteristic } = node;
      for (const dep of characteristic.dependencies.optional) {
        if (!ctx.hasValue(dep)) {
          this.log.debug(
            `${characteristic.name}: optional dependency ${BluetoothUuid.from(dep).shortForm} not available`,
          );
        }
      }
      const result = characteristic.parse(node.raw, ctx, options);
      ctx.set(node.key, result);
      results[node.input] = result;
    }

    // Keep the caller's key order.
    const sorted: BatchResult = {};
    for (const [id] of Object.entries(input)) {
      const result = results[id];
      if (result) sorted[id] = result;
    }
    return sorted;
  }

  private unresolved(id: string, raw: Uint8Array): DecodedResult<unknown> {
    const info = this.registry.resolve(id);
    const err = new UuidResolutionError(id);
    this.log.debug(info ? `No decoder registered for '${info.name}'` : err.message);
    return failureResult(info, raw, err, createTrace(false));
  }

  /** Kahn's algorithm. Ties keep the input order. */
  private order(nodes: readonly BatchNode[]): BatchNode[] {
    const byKey = new Map<string, BatchNode[]>();
    for (const node of nodes) byKey.set(node.key, [...(byKey.get(node.key) ?? []), node]);

    const dependents = new Map<BatchNode, BatchNode[]>();
    const inDegree = new Map<BatchNode, number>();
    for (const node of nodes) {
      inDegree.set(node, 0);
      dependents.set(node, []);
    }

    for (const node of nodes) {
      const { required, optional } = node.characteristic.dependencies;
      const deps = new Set([...required, ...optional].map((d) => BluetoothUuid.from(d).longForm));
      for (const depKey of deps) {
        for (const dep of byKey.get(depKey) ?? []) {
          dependents.get(dep)?.push(node);
          inDegree.set(node, (inDegree.get(node) ?? 0) + 1);
        }
      }
    }

    const ready = nodes.filter((n) => inDegree.get(n) === 0);
    const ordered: BatchNode[] = [];
    while (ready.length > 0) {
      const node = ready.shift();
      if (!node) break;
      ordered.push(node);
      for (const next of dependents.get(node) ?? []) {
        const remaining = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, remaining);
        if (remaining === 0) ready.push(next);
      }
    }

    if (ordered.length < nodes.length) {
      const stuck = nodes.filter((n) => !ordered.includes(n));
      throw new DependencyCycleError(this.findCycle(stuck, byKey));
    }
    return ordered;
  }

  /** Walk dependency edges among the unordered nodes until one repeats. */
  private findCycle(stuck: readonly BatchNode[], byKey: ReadonlyMap<string, BatchNode[]>): string[] {
    const inStuck = new Set(stuck);
    const path: BatchNode[] = [];
    let current: BatchNode | undefined = stuck[0];

    while (current && !path.includes(current)) {
      path.push(current);
      const { required, optional }: DependencyDeclaration = current.characteristic.dependencies;
      current = [...required, ...optional]
        .flatMap((d) => byKey.get(BluetoothUuid.from(d).longForm) ?? [])
        .find((n) => inStuck.has(n));
    }

    if (!current) return stuck.map((n) => n.characteristic.name);
    // path[i] depends on path[i + 1]; report in decode order (dependency first).
    const cycle = path.slice(path.indexOf(current)).reverse();
    return [...cycle, cycle[0]].map((n) => n.characteristic.name);
  }
}
