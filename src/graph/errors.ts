/**
 * Structural errors and the result type every structural operation returns.
 * Errors are values; nothing here is thrown.
 */

import type { SceneId, SceneVariantId } from "../story/id.ts";

export type StoryboardError =
  | { kind: "unknownScene"; scene: SceneId }
  | { kind: "sceneNotInGraph"; scene: SceneId }
  | { kind: "invalidMove"; scene: SceneId; from: SceneId; dest: SceneId }
  | { kind: "cycleDetected"; scene: SceneId; dest: SceneId }
  | { kind: "unknownVariant"; scene: SceneId; variant: SceneVariantId }
  | { kind: "indexOutOfRange"; scene: SceneId; index: number; length: number };

export type Result<T, E = StoryboardError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err(error: StoryboardError): Result<never> {
  return { ok: false, error };
}

/** Human-readable message naming the error and the scenes involved. */
export function describeError(error: StoryboardError): string {
  switch (error.kind) {
    case "unknownScene":
      return `Scene ${error.scene} is not in the storyboard`;
    case "sceneNotInGraph":
      return `Scene ${error.scene} is not in the scene graph`;
    case "invalidMove":
      return `Cannot move scene ${error.scene} from ${error.from} to ${error.dest}: it does not follow ${error.from}`;
    case "cycleDetected":
      return `Moving scene ${error.scene} under ${error.dest} would create a cycle`;
    case "unknownVariant":
      return `Scene ${error.scene} has no variant ${error.variant}`;
    case "indexOutOfRange":
      return `Index ${error.index} is outside scene ${error.scene} (0..${error.length})`;
  }
}
