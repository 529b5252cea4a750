import type { TaskInstance, TaskSpec } from "../task/spec.js";
import { log } from "../utils/logger.js";
import type { Workflow } from "./workflow.js";

/**
 * Key of a construction: the inputs that had concrete values (in field order)
 * and the combined hash of those values.
 */
export type ConstructionKey = {
  names: string[];
  hash: string;
};

type CacheGroup = {
  names: readonly string[];
  entries: Map<string, Workflow>;
};

export type ConstructionCacheStats = {
  groups: number;
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
};

export function constructionKey(instance: TaskInstance): ConstructionKey {
  const names = instance.concreteFieldNames();
  return { names, hash: instance.computeHashes(names).hash };
}

function groupKey(names: readonly string[]): string {
  return names.join(",");
}

/**
 * Memoizes constructed workflows per task specification. Entries are grouped
 * by the set of inputs that were concrete at construction; a graph built with
 * an input still lazy serves every later construction in which that input is
 * known, as long as the remaining values hash the same.
 */
export class ConstructionCache {
  private specs = new Map<TaskSpec, Map<string, CacheGroup>>();
  private stats = { hits: 0, misses: 0 };

  /**
   * Find a graph for the instance: first among graphs built with exactly the
   * same concrete inputs, then among graphs built with fewer of them.
   */
  lookup(instance: TaskInstance): Workflow | undefined {
    const groups = this.specs.get(instance.spec);
    const concrete = instance.concreteFieldNames();
    if (groups) {
      const exact = groups.get(groupKey(concrete));
      const candidates = [...(exact ? [exact] : []), ...[...groups.values()].filter((g) => g !== exact)];
      for (const group of candidates) {
        if (!group.names.every((name) => concrete.includes(name))) continue;
        const hash = instance.computeHashes(group.names).hash;
        const hit = group.entries.get(hash);
        if (hit) {
          this.stats.hits++;
          log.debug("Construction cache hit", {
            workflow: instance.spec.name,
            group: groupKey(group.names),
            hash: hash.slice(0, 8),
          });
          return hit;
        }
      }
    }
    this.stats.misses++;
    log.debug("Construction cache miss", { workflow: instance.spec.name, concrete });
    return undefined;
  }

  store(instance: TaskInstance, workflow: Workflow): void {
    const { names, hash } = constructionKey(instance);
    let groups = this.specs.get(instance.spec);
    if (!groups) {
      groups = new Map<string, CacheGroup>();
      this.specs.set(instance.spec, groups);
    }
    const key = groupKey(names);
    let group = groups.get(key);
    if (!group) {
      group = { names, entries: new Map<string, Workflow>() };
      groups.set(key, group);
    }
    group.entries.set(hash, workflow);
    log.debug("Construction cached", { workflow: instance.spec.name, group: key, hash: hash.slice(0, 8) });
  }

  /** Drop every entry, or only those of one task specification. */
  clear(spec?: TaskSpec): void {
    if (spec) {
      this.specs.delete(spec);
    } else {
      this.specs.clear();
      this.stats = { hits: 0, misses: 0 };
    }
    log.debug("Construction cache cleared", spec ? { workflow: spec.name } : undefined);
  }

  /** Concrete-input groups held for a specification, in insertion order. */
  groups(spec: TaskSpec): string[][] {
    return [...(this.specs.get(spec)?.values() ?? [])].map((g) => [...g.names]);
  }

  getStats(): ConstructionCacheStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      groups: [...this.specs.values()].reduce((n, groups) => n + groups.size, 0),
      entries: this.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  /** Number of cached graphs. */
  get size(): number {
    let size = 0;
    for (const groups of this.specs.values()) {
      for (const group of groups.values()) size += group.entries.size;
    }
    return size;
  }
}

/** Cache used by `Workflow.construct` unless another one is passed. */
export const defaultConstructionCache = new ConstructionCache();
