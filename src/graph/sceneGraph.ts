/**
 * Scene Graph
 *
 * Ordering and relationships between scenes: which scenes can follow
 * which, and where the story may start. Holds ids only, never scene
 * content. Branches, merges and (outside of `moveScene`) cycles are all
 * allowed.
 *
 * Invariants after every public call:
 *   - every root is a member (a key of `edges`)
 *   - every successor is a member
 */

import type { SceneId } from "../story/id.ts";
import { err, ok } from "./errors.ts";
import type { Result } from "./errors.ts";
import { breadthFirst, isDescendant, reachableFrom } from "./graphUtils.ts";
import type { StoryboardUpdate } from "./updates.ts";

export class SceneGraph {
  private readonly edges = new Map<SceneId, Set<SceneId>>();
  private readonly rootSet = new Set<SceneId>();

  // ── Queries ──────────────────────────────────────────────────────────

  get size(): number {
    return this.edges.size;
  }

  has(id: SceneId): boolean {
    return this.edges.has(id);
  }

  isRoot(id: SceneId): boolean {
    return this.rootSet.has(id);
  }

  roots(): SceneId[] {
    return [...this.rootSet];
  }

  scenes(): SceneId[] {
    return [...this.edges.keys()];
  }

  /** Whether `target` can be reached from `start` (including `start` itself). */
  reaches(start: SceneId, target: SceneId): boolean {
    return isDescendant(this.edges, start, target);
  }

  /**
   * Direct successors of `id`. The iterable is lazy and can be iterated
   * again; an unknown id yields nothing.
   */
  nextScenes(id: SceneId): Iterable<SceneId> {
    const edges = this.edges;
    return {
      *[Symbol.iterator]() {
        const successors = edges.get(id);
        if (successors) yield* successors;
      },
    };
  }

  /** Members that no root can reach. With no roots, every member. */
  unreachableScenes(): Set<SceneId> {
    const reached = reachableFrom(this.edges, this.rootSet);
    return new Set(this.scenes().filter((id) => !reached.has(id)));
  }

  // ── Mutations ────────────────────────────────────────────────────────

  /** Add a scene with no successors. Does nothing if it is already a member. */
  addScene(id: SceneId): StoryboardUpdate {
    if (!this.edges.has(id)) this.edges.set(id, new Set());
    return { kind: "sceneAdded", scene: id };
  }

  /** Mark a scene as an entry point, adding it first if needed. */
  addRoot(id: SceneId): StoryboardUpdate {
    this.addScene(id);
    this.rootSet.add(id);
    return { kind: "sceneSetAsRoot", scene: id };
  }

  /** Add the transition `from → dest`, adding either scene if needed. */
  addEdge(from: SceneId, dest: SceneId): StoryboardUpdate {
    this.addScene(from);
    this.addScene(dest);
    this.successors(from).add(dest);
    return { kind: "linkedScenes", from, dest };
  }

  /**
   * Move `scene` from under `from` to under `dest`.
   *
   * Fails with `sceneNotInGraph` for the first of scene/from/dest that is
   * missing, `invalidMove` when `scene` does not follow `from`, and
   * `cycleDetected` when `scene` can already reach `dest` (the new edge
   * `dest → scene` would close a loop). A failed move leaves the graph
   * unchanged.
   */
  moveScene(
    scene: SceneId,
    from: SceneId,
    dest: SceneId,
  ): Result<StoryboardUpdate> {
    for (const id of [scene, from, dest]) {
      if (!this.edges.has(id)) return err({ kind: "sceneNotInGraph", scene: id });
    }

    const moved: StoryboardUpdate = { kind: "moved", scene, from, dest };
    if (from === dest) return ok(moved);

    const fromEdges = this.successors(from);
    if (!fromEdges.delete(scene)) {
      return err({ kind: "invalidMove", scene, from, dest });
    }

    if (isDescendant(this.edges, scene, dest)) {
      fromEdges.add(scene);
      return err({ kind: "cycleDetected", scene, dest });
    }

    this.successors(dest).add(scene);
    return ok(moved);
  }

  /** Remove a scene, its root mark and every edge into or out of it. */
  deleteScene(id: SceneId): Result<StoryboardUpdate> {
    if (!this.edges.delete(id)) {
      return err({ kind: "sceneNotInGraph", scene: id });
    }
    this.rootSet.delete(id);
    for (const successors of this.edges.values()) {
      successors.delete(id);
    }
    return ok({ kind: "sceneDeleted", scene: id });
  }

  /** Remove the transition `from → dest`. A missing edge is not an error. */
  deleteEdge(from: SceneId, dest: SceneId): Result<StoryboardUpdate> {
    const successors = this.edges.get(from);
    if (!successors) return err({ kind: "sceneNotInGraph", scene: from });
    successors.delete(dest);
    return ok({ kind: "edgeDeleted", from, dest });
  }

  // ── Diagnostics ──────────────────────────────────────────────────────

  /**
   * Render the graph as an indented breadth-first listing.
   *
   * With `start`, lists the scenes reachable from it. Without, lists each
   * root under a `ROOT:` header; a scene reachable from several roots is
   * listed only under the first root that reaches it.
   */
  formatFrom(start?: SceneId): string[] {
    if (start !== undefined) {
      return breadthFirst(this.edges, start).map(formatLine);
    }

    const visited = new Set<SceneId>();
    const out: string[] = [];
    for (const root of this.rootSet) {
      out.push(`ROOT: ${root}`);
      for (const line of breadthFirst(this.edges, root, visited)) {
        out.push(formatLine(line));
      }
      out.push("");
    }
    return out;
  }

  printFrom(start?: SceneId, write: (line: string) => void = console.log): void {
    for (const line of this.formatFrom(start)) write(line);
  }

  private successors(id: SceneId): Set<SceneId> {
    let set = this.edges.get(id);
    if (!set) {
      set = new Set();
      this.edges.set(id, set);
    }
    return set;
  }
}

function formatLine({ id, depth }: { id: SceneId; depth: number }): string {
  return `${"  ".repeat(depth)}- ${id}`;
}
