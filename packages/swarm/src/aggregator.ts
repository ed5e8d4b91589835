/**
 * @swarmplan/swarm — Result aggregator
 *
 * Walks roles in requested order, so arrival order never shows in the result.
 */

import { silentLogger, type Logger } from '@swarmplan/core';
import type {
    AggregatedResult, DesignDocument, PartialOutput, SyncPoint, TrackOutput,
} from '@swarmplan/shared-types';
import type { TaskGraph } from './dag.js';
import { analyzeContract } from './contracts.js';

/** Fresh, mutable copy owned by the caller */
export function aggregate(
    graph: TaskGraph,
    outputs: Readonly<Record<string, PartialOutput>>,
    logger: Logger = silentLogger,
): AggregatedResult {
    let design: DesignDocument | null = null;
    const tracks = new Map<string, TrackOutput>();

    for (const role of graph.roles) {
        const output = outputs[role];
        if (!output) {
            throw new Error(`No output for "${role}"`);
        }
        if (output.kind === 'design') {
            design ??= structuredClone(output.design);
        } else {
            tracks.set(role, output);
        }
    }

    const result: AggregatedResult = { design, sync_points: [] };
    for (const [role, output] of tracks) {
        result[`${role}_tasks`] = structuredClone(output.tasks);
    }
    result.sync_points = syncPoints(graph, tracks, logger);
    return result;
}

function syncPoints(graph: TaskGraph, tracks: Map<string, TrackOutput>, logger: Logger): SyncPoint[] {
    const points: SyncPoint[] = [];
    for (const [a, b] of graph.siblingPairs()) {
        const left = tracks.get(a);
        const right = tracks.get(b);
        if (!left || !right) continue;
        try {
            const point = analyzeContract(left, right);
            if (point) points.push(point);
        } catch (error) {
            logger.warn(`Sync analysis failed for ${a}/${b}, skipping`, {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
    return points;
}
