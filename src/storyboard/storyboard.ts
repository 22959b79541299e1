/**
 * Storyboard
 *
 * The project workbench. Owns the scene bank (content), authors,
 * characters, title and template, plus the scene graph (structure).
 * Every structural edit goes through here: ids are checked against the
 * scene bank, the graph performs the change, and the returned update is
 * applied by touching the metadata of each scene it names.
 */

import { err, ok } from "../graph/errors.ts";
import type { Result } from "../graph/errors.ts";
import { SceneGraph } from "../graph/sceneGraph.ts";
import { affectedScenes } from "../graph/updates.ts";
import type { StoryboardUpdate } from "../graph/updates.ts";
import type { AuthorId, CharacterId, SceneId, SceneVariantId } from "../story/id.ts";
import { createMetadata, systemClock, touch } from "../story/metadata.ts";
import type { Clock, Metadata } from "../story/metadata.ts";
import {
  createSceneVariant,
  findVariant,
  insertElement,
  isInsertionIndex,
} from "../story/scene.ts";
import type {
  Author,
  Character,
  Scene,
  SceneElement,
  SceneVariant,
} from "../story/types.ts";
import type { StoryTemplate, Summary, Title } from "../story/values.ts";
import { computeSceneOrder } from "./sceneOrdering.ts";

export interface StoryboardOptions {
  /** Time source for metadata (default: system time). */
  clock?: Clock;
  /** Line sink for `printFrom` (default: console.log). */
  write?: (line: string) => void;
  title?: Title;
  template?: StoryTemplate;
}

export class Storyboard {
  readonly metadata: Metadata;

  private titleValue: Title | undefined;
  private summaryValue: Summary | undefined;
  private templateValue: StoryTemplate | undefined;
  private readonly authorMap = new Map<AuthorId, Author>();
  private readonly sceneBank = new Map<SceneId, Scene>();
  private readonly characterMap = new Map<CharacterId, Character>();
  private readonly graph = new SceneGraph();
  private readonly clock: Clock;
  private readonly write: (line: string) => void;

  constructor(options?: StoryboardOptions) {
    this.clock = options?.clock ?? systemClock;
    this.write = options?.write ?? console.log;
    this.titleValue = options?.title;
    this.templateValue = options?.template;
    this.metadata = createMetadata(this.clock);
  }

  // ── Project details ──────────────────────────────────────────────────

  get title(): Title | undefined {
    return this.titleValue;
  }

  get summary(): Summary | undefined {
    return this.summaryValue;
  }

  get template(): StoryTemplate | undefined {
    return this.templateValue;
  }

  updateTitle(title: Title): void {
    this.titleValue = title;
    touch(this, this.clock);
  }

  clearTitle(): void {
    this.titleValue = undefined;
    touch(this, this.clock);
  }

  updateSummary(summary: Summary): void {
    this.summaryValue = summary;
    touch(this, this.clock);
  }

  clearSummary(): void {
    this.summaryValue = undefined;
    touch(this, this.clock);
  }

  /** Select the script format. Existing scenes are left as they are. */
  updateTemplate(template: StoryTemplate): void {
    this.templateValue = template;
    touch(this, this.clock);
  }

  clearTemplate(): void {
    this.templateValue = undefined;
    touch(this, this.clock);
  }

  /** Add an author, replacing any author with the same id. */
  addAuthor(author: Author): void {
    this.authorMap.set(author.id, author);
    touch(this, this.clock);
  }

  /** Returns false if no author had that id. */
  removeAuthor(id: AuthorId): boolean {
    const removed = this.authorMap.delete(id);
    if (removed) touch(this, this.clock);
    return removed;
  }

  /** Add a character, replacing any character with the same id. */
  addCharacter(character: Character): void {
    this.characterMap.set(character.id, character);
    touch(this, this.clock);
  }

  removeCharacter(id: CharacterId): boolean {
    const removed = this.characterMap.delete(id);
    if (removed) touch(this, this.clock);
    return removed;
  }

  author(id: AuthorId): Author | null {
    return this.authorMap.get(id) ?? null;
  }

  authors(): Author[] {
    return [...this.authorMap.values()];
  }

  character(id: CharacterId): Character | null {
    return this.characterMap.get(id) ?? null;
  }

  characters(): Character[] {
    return [...this.characterMap.values()];
  }

  scene(id: SceneId): Scene | null {
    return this.sceneBank.get(id) ?? null;
  }

  scenes(): Scene[] {
    return [...this.sceneBank.values()];
  }

  // ── Structure ────────────────────────────────────────────────────────

  /** Register a scene in the scene bank and the scene graph. */
  addScene(scene: Scene): Result<StoryboardUpdate> {
    this.sceneBank.set(scene.id, scene);
    return this.commit(ok(this.graph.addScene(scene.id)));
  }

  /** Mark a scene as a story entry point. */
  setSceneAsRoot(id: SceneId): Result<StoryboardUpdate> {
    const missing = this.findUnknown([id]);
    if (missing) return missing;
    return this.commit(ok(this.graph.addRoot(id)));
  }

  /** Make `dest` a possible next scene after `from`. */
  linkScenes(from: SceneId, dest: SceneId): Result<StoryboardUpdate> {
    const missing = this.findUnknown([from, dest]);
    if (missing) return missing;
    return this.commit(ok(this.graph.addEdge(from, dest)));
  }

  /** Remove `dest` as a next scene after `from`; both scenes remain. */
  unlinkScenes(from: SceneId, dest: SceneId): Result<StoryboardUpdate> {
    const missing = this.findUnknown([from, dest]);
    if (missing) return missing;
    return this.commit(this.graph.deleteEdge(from, dest));
  }

  /** Reparent `scene` from under `from` to under `dest`. */
  moveScene(
    scene: SceneId,
    from: SceneId,
    dest: SceneId,
  ): Result<StoryboardUpdate> {
    const missing = this.findUnknown([scene, from, dest]);
    if (missing) return missing;
    return this.commit(this.graph.moveScene(scene, from, dest));
  }

  /**
   * Remove a scene from the scene bank and the scene graph, along with
   * every edge touching it. A scene not in the bank is a no-op (`null`).
   */
  deleteScene(id: SceneId): Result<StoryboardUpdate | null> {
    if (!this.sceneBank.has(id)) return ok(null);

    const result = this.graph.deleteScene(id);
    if (result.ok) this.sceneBank.delete(id);
    return this.commit(result);
  }

  nextScenes(id: SceneId): Iterable<SceneId> {
    return this.graph.nextScenes(id);
  }

  roots(): SceneId[] {
    return this.graph.roots();
  }

  /** Scenes that no root reaches; they appear in no story path. */
  standaloneScenes(): Set<SceneId> {
    return this.graph.unreachableScenes();
  }

  /** Every scene in reading order: root paths first, then the rest. */
  outline(): SceneId[] {
    return computeSceneOrder(this.graph);
  }

  printFrom(start?: SceneId): void {
    this.graph.printFrom(start, this.write);
  }

  // ── Scene content ────────────────────────────────────────────────────

  /** Add a draft to a scene. The active variant does not change. */
  addSceneVariant(
    sceneId: SceneId,
    variant: SceneVariant = createSceneVariant({ clock: this.clock }),
  ): Result<SceneVariant> {
    const scene = this.sceneBank.get(sceneId);
    if (!scene) return err({ kind: "unknownScene", scene: sceneId });

    scene.variants.push(variant);
    touch(scene, this.clock);
    return ok(variant);
  }

  setActiveVariant(sceneId: SceneId, variantId: SceneVariantId): Result<Scene> {
    const scene = this.sceneBank.get(sceneId);
    if (!scene) return err({ kind: "unknownScene", scene: sceneId });
    if (!findVariant(scene, variantId)) {
      return err({ kind: "unknownVariant", scene: sceneId, variant: variantId });
    }

    scene.activeVariant = variantId;
    touch(scene, this.clock);
    return ok(scene);
  }

  /**
   * Insert an element into a scene's active variant, or into `variant`
   * when given. Appends unless `index` is given; an index outside
   * 0..elements.length fails with `indexOutOfRange`.
   */
  addSceneElement(
    sceneId: SceneId,
    element: SceneElement,
    opts?: { variant?: SceneVariantId; index?: number },
  ): Result<SceneVariant> {
    const scene = this.sceneBank.get(sceneId);
    if (!scene) return err({ kind: "unknownScene", scene: sceneId });

    const variantId = opts?.variant ?? scene.activeVariant;
    const variant = findVariant(scene, variantId);
    if (!variant) {
      return err({ kind: "unknownVariant", scene: sceneId, variant: variantId });
    }

    const index = opts?.index ?? variant.elements.length;
    if (!isInsertionIndex(variant, index)) {
      return err({
        kind: "indexOutOfRange",
        scene: sceneId,
        index,
        length: variant.elements.length,
      });
    }

    insertElement(variant, element, index, this.clock);
    touch(scene, this.clock);
    return ok(variant);
  }

  // ── Internal helpers ─────────────────────────────────────────────────

  private findUnknown(ids: SceneId[]): Result<never> | null {
    for (const id of ids) {
      if (!this.sceneBank.has(id)) return err({ kind: "unknownScene", scene: id });
    }
    return null;
  }

  /** Apply a successful update's side effects and pass the result through. */
  private commit<T extends StoryboardUpdate | null>(result: Result<T>): Result<T> {
    if (result.ok) this.applyUpdate(result.value);
    return result;
  }

  private applyUpdate(update: StoryboardUpdate | null): void {
    if (update === null) return;
    // A scene named twice (a move within one parent) is touched once,
    // so its version goes up by one rather than once per mention.
    for (const id of new Set(affectedScenes(update))) {
      const scene = this.sceneBank.get(id);
      if (scene) touch(scene, this.clock);
    }
  }
}
