import type { Stage } from '../types/index.js';

/**
 * Identifiers already processed, per stage, plus every sub-identifier
 * processed anywhere in the run.
 *
 * The sub-identifier set is global: once a sub-identifier has been taken
 * under one parent it is never taken again, even under a different parent.
 *
 * Nothing is ever removed. One registry lives for one run.
 */
export class IdentifierRegistry {
    private readonly byStage = new Map<Stage, Set<string>>();
    private readonly subIds = new Set<string>();

    seen(stage: Stage, id: string): boolean {
        return this.byStage.get(stage)?.has(id) ?? false;
    }

    /**
     * Inserts without checking. Callers test `seen` first.
     */
    mark(stage: Stage, id: string): void {
        let ids = this.byStage.get(stage);
        if (!ids) {
            ids = new Set<string>();
            this.byStage.set(stage, ids);
        }
        ids.add(id);
    }

    seenSub(subId: string): boolean {
        return this.subIds.has(subId);
    }

    markSub(subId: string): void {
        this.subIds.add(subId);
    }

    count(stage: Stage): number {
        return this.byStage.get(stage)?.size ?? 0;
    }

    subCount(): number {
        return this.subIds.size;
    }
}
