/**
 * Compute a reading order for the scene graph via depth-first traversal
 * from each root, in root order. Scenes no root reaches follow, each
 * starting its own traversal, taken in id order.
 */

import type { SceneGraph } from "../graph/sceneGraph.ts";
import type { SceneId } from "../story/id.ts";

export function computeSceneOrder(graph: SceneGraph): SceneId[] {
  const visited = new Set<SceneId>();
  const order: SceneId[] = [];

  function dfs(sceneId: SceneId) {
    if (visited.has(sceneId) || !graph.has(sceneId)) return;
    visited.add(sceneId);
    order.push(sceneId);

    for (const next of graph.nextScenes(sceneId)) dfs(next);
  }

  for (const root of graph.roots()) dfs(root);

  const orphans = graph
    .scenes()
    .filter((id) => !visited.has(id))
    .sort();

  for (const id of orphans) dfs(id);

  return order;
}
