import { logger } from "./utils/logger.ts";
import { NotFittedError } from "./utils/errors.ts";
import { cosineSimilarity, round2 } from "./utils/vector.ts";
import type { CollaborativePrediction, Freelancer } from "./utils/types.ts";

/** Neighbourhood size for affinity prediction. */
export const NEIGHBOR_COUNT = 5;
export const DEFAULT_TOP_N = 5;
export const MAX_RATING = 5;

/**
 * Client × freelancer ratings. `null` marks "never worked together", so an
 * observed rating of 0 stays a real rating.
 */
export type InteractionRow = readonly (number | null)[];

export interface InteractionMatrix {
  clientIds: readonly string[];
  freelancerIds: readonly string[];
  rows: readonly InteractionRow[];
}

interface TrainedState {
  matrix: InteractionMatrix;
  clientIndex: ReadonlyMap<string, number>;
  // Dense copies with 0 for missing, used for similarity
  dense: readonly number[][];
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Builds the interaction matrix. Ids are sorted so indices are stable
 * across retrains; when a pair has several engagements the last one in the
 * freelancer's project history wins.
 */
export function buildInteractionMatrix(freelancers: readonly Freelancer[]): InteractionMatrix {
  const freelancerIds = [...new Set(freelancers.map((f) => f.id))].sort(compareIds);
  const clientIds = [
    ...new Set(freelancers.flatMap((f) => f.pastProjects.map((p) => p.clientId))),
  ].sort(compareIds);

  const freelancerCol = new Map(freelancerIds.map((id, i) => [id, i]));
  const clientRow = new Map(clientIds.map((id, i) => [id, i]));

  const rows: (number | null)[][] = clientIds.map(() =>
    new Array<number | null>(freelancerIds.length).fill(null)
  );

  for (const freelancer of freelancers) {
    const col = freelancerCol.get(freelancer.id);
    if (col === undefined) continue;
    for (const project of freelancer.pastProjects) {
      const row = clientRow.get(project.clientId);
      if (row === undefined) continue;
      rows[row][col] = project.rating;
    }
  }

  return { clientIds, freelancerIds, rows };
}

export class CollaborativeModel {
  private state: TrainedState | null = null;

  get status(): "untrained" | "trained" {
    return this.state ? "trained" : "untrained";
  }

  /** Rebuilds the matrix and index maps from scratch. */
  train(freelancers: readonly Freelancer[]): void {
    const matrix = buildInteractionMatrix(freelancers);
    this.state = {
      matrix,
      clientIndex: new Map(matrix.clientIds.map((id, i) => [id, i])),
      dense: matrix.rows.map((row) => row.map((v) => v ?? 0)),
    };
    logger.info(
      `Collaborative model trained: ${matrix.clientIds.length} clients × ${matrix.freelancerIds.length} freelancers`
    );
  }

  interactionMatrix(): InteractionMatrix {
    return this.requireState().matrix;
  }

  hasClient(clientId: string): boolean {
    return this.requireState().clientIndex.has(clientId);
  }

  /**
   * Predicts ratings for freelancers the client has not worked with, from
   * the ratings of the most similar other clients. Each prediction is
   * divided by the summed similarity of the whole neighbourhood, so a
   * neighbour who never rated the freelancer pulls it toward 0. Unknown
   * clients and clients without history get an empty list.
   */
  predictForClient(clientId: string, topN: number = DEFAULT_TOP_N): CollaborativePrediction[] {
    const { matrix, clientIndex, dense } = this.requireState();

    const clientRow = clientIndex.get(clientId);
    if (clientRow === undefined) {
      logger.debug(`No interaction history for client ${clientId}`);
      return [];
    }

    const own = matrix.rows[clientRow];
    if (own.every((v) => v === null)) return [];

    const neighbors = dense
      .map((row, i) => ({ row: i, similarity: cosineSimilarity(dense[clientRow], row) }))
      .filter((n) => n.row !== clientRow)
      .sort((a, b) => b.similarity - a.similarity || a.row - b.row)
      .slice(0, NEIGHBOR_COUNT);

    const totalWeight = neighbors.reduce((sum, n) => sum + n.similarity, 0);
    if (totalWeight === 0) {
      logger.debug(`No similar clients for ${clientId}`);
      return [];
    }

    const predictions: { freelancerId: string; predicted: number }[] = [];

    for (let col = 0; col < matrix.freelancerIds.length; col++) {
      if (own[col] !== null) continue;

      let weighted = 0;
      for (const n of neighbors) {
        weighted += n.similarity * dense[n.row][col];
      }

      const predicted = weighted / totalWeight;
      if (predicted > 0) {
        predictions.push({ freelancerId: matrix.freelancerIds[col], predicted });
      }
    }

    predictions.sort(
      (a, b) => b.predicted - a.predicted || compareIds(a.freelancerId, b.freelancerId)
    );

    return predictions.slice(0, Math.max(0, topN)).map((p, i) => ({
      rank: i + 1,
      freelancerId: p.freelancerId,
      predictedRating: round2(p.predicted),
      matchScore: round2((p.predicted / MAX_RATING) * 100),
    }));
  }

  private requireState(): TrainedState {
    if (!this.state) throw new NotFittedError("CollaborativeModel");
    return this.state;
  }
}
