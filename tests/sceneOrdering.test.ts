import { describe, it, expect } from "vitest";
import { SceneGraph } from "../src/graph/sceneGraph.ts";
import { computeSceneOrder } from "../src/storyboard/sceneOrdering.ts";
import { newId } from "../src/story/id.ts";

describe("computeSceneOrder", () => {
  it("is empty for an empty graph", () => {
    expect(computeSceneOrder(new SceneGraph())).toEqual([]);
  });

  it("walks each branch depth-first before the next", () => {
    const graph = new SceneGraph();
    const [a, b, c, d] = [1, 2, 3, 4].map(() => newId("scene"));
    graph.addRoot(a);
    graph.addEdge(a, b);
    graph.addEdge(a, c);
    graph.addEdge(b, d);
    graph.addEdge(c, d);

    expect(computeSceneOrder(graph)).toEqual([a, b, d, c]);
  });

  it("lists each scene once when the graph has a cycle", () => {
    const graph = new SceneGraph();
    const [a, b] = [1, 2].map(() => newId("scene"));
    graph.addRoot(a);
    graph.addEdge(a, b);
    graph.addEdge(b, a);

    expect(computeSceneOrder(graph)).toEqual([a, b]);
  });

  it("follows roots in the order they were marked", () => {
    const graph = new SceneGraph();
    const [a, b] = [1, 2].map(() => newId("scene"));
    graph.addRoot(b);
    graph.addRoot(a);

    expect(computeSceneOrder(graph)).toEqual([b, a]);
  });

  it("places unreachable scenes last, sorted by id, with their successors", () => {
    const graph = new SceneGraph();
    const [root, x, y] = [1, 2, 3].map(() => newId("scene"));
    graph.addRoot(root);
    graph.addEdge(x, y);

    // Either order of x and y yields id order here: y has no successors.
    expect(computeSceneOrder(graph)).toEqual([root, ...[x, y].sort()]);
  });

  it("skips a successor that a lower id already reached", () => {
    const graph = new SceneGraph();
    const [x, y, z] = [1, 2, 3].map(() => newId("scene")).sort();
    graph.addEdge(x, z);
    graph.addScene(y);

    expect(computeSceneOrder(graph)).toEqual([x, z, y]);
  });
});
