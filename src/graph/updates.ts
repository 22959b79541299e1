/**
 * Change notifications.
 *
 * The scene graph returns one of these from every successful mutation
 * instead of calling back into its owner. The storyboard decides how to
 * react (touching metadata of the scenes named).
 */

import type { SceneId } from "../story/id.ts";

export type StoryboardUpdate =
  | { kind: "sceneAdded"; scene: SceneId }
  | { kind: "sceneSetAsRoot"; scene: SceneId }
  | { kind: "linkedScenes"; from: SceneId; dest: SceneId }
  | { kind: "moved"; scene: SceneId; from: SceneId; dest: SceneId }
  | { kind: "sceneDeleted"; scene: SceneId }
  | { kind: "edgeDeleted"; from: SceneId; dest: SceneId };

/** The scene ids an update refers to, in field order. */
export function affectedScenes(update: StoryboardUpdate): SceneId[] {
  switch (update.kind) {
    case "moved":
      return [update.scene, update.from, update.dest];
    case "sceneAdded":
    case "sceneSetAsRoot":
    case "sceneDeleted":
      return [update.scene];
    case "linkedScenes":
    case "edgeDeleted":
      return [update.from, update.dest];
  }
}
