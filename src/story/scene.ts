/**
 * Entity constructors and scene content mutations.
 *
 * Constructors assign a fresh id and new metadata. Mutations here touch
 * only the entity they change; structural side effects belong to the
 * storyboard.
 */

import { newId } from "./id.ts";
import type { CharacterId, SceneId, SceneVariantId } from "./id.ts";
import { createMetadata, systemClock, touch } from "./metadata.ts";
import type { Clock } from "./metadata.ts";
import type {
  Author,
  Character,
  Dialogue,
  DialogueBlock,
  Scene,
  SceneElement,
  SceneHeading,
  SceneVariant,
} from "./types.ts";
import type { AuthorName, CharacterName } from "./values.ts";

// ── Constructors ───────────────────────────────────────────────────────

/** Create a scene variant, empty unless a heading or elements are given. */
export function createSceneVariant(opts?: {
  heading?: SceneHeading;
  elements?: SceneElement[];
  clock?: Clock;
}): SceneVariant {
  const variant: SceneVariant = {
    id: newId("sceneVariant"),
    elements: [...(opts?.elements ?? [])],
    metadata: createMetadata(opts?.clock),
  };
  if (opts?.heading !== undefined) {
    variant.heading = opts.heading;
  }
  return variant;
}

/**
 * Create a scene. Without `variants`, the scene starts with one empty
 * variant; otherwise the first variant given becomes active.
 */
export function createScene(opts?: {
  variants?: SceneVariant[];
  clock?: Clock;
}): Scene {
  const variants = opts?.variants ?? [createSceneVariant({ clock: opts?.clock })];
  const [first] = variants;
  if (!first) throw new Error("A scene needs at least one variant");

  return {
    id: newId("scene"),
    activeVariant: first.id,
    variants: [...variants],
    metadata: createMetadata(opts?.clock),
  };
}

export function createDialogue(
  scene: SceneId,
  speaker: CharacterId,
  opts?: { content?: DialogueBlock[]; clock?: Clock },
): Dialogue {
  return {
    id: newId("dialogue"),
    scene,
    speaker,
    content: [...(opts?.content ?? [])],
    metadata: createMetadata(opts?.clock),
  };
}

export function createAuthor(name: AuthorName, clock?: Clock): Author {
  return { id: newId("author"), name, metadata: createMetadata(clock) };
}

export function createCharacter(name: CharacterName, clock?: Clock): Character {
  return { id: newId("character"), name, metadata: createMetadata(clock) };
}

// ── Content mutations ──────────────────────────────────────────────────

export function findVariant(
  scene: Scene,
  variantId: SceneVariantId,
): SceneVariant | null {
  return scene.variants.find((v) => v.id === variantId) ?? null;
}

export function getActiveVariant(scene: Scene): SceneVariant | null {
  return findVariant(scene, scene.activeVariant);
}

/** Append a dialogue block and touch the dialogue. */
export function addDialogueBlock(
  dialogue: Dialogue,
  block: DialogueBlock,
  clock: Clock = systemClock,
): void {
  dialogue.content.push(block);
  touch(dialogue, clock);
}

/** Whether `index` is a valid insertion point (0 through length). */
export function isInsertionIndex(variant: SceneVariant, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index <= variant.elements.length;
}

/**
 * Insert an element into a variant at `index` (appends by default) and
 * touch the variant. Throws a RangeError for an index outside
 * 0..elements.length.
 */
export function insertElement(
  variant: SceneVariant,
  element: SceneElement,
  index?: number,
  clock: Clock = systemClock,
): void {
  const insertAt = index ?? variant.elements.length;
  if (!isInsertionIndex(variant, insertAt)) {
    throw new RangeError(
      `Element index ${insertAt} is outside 0..${variant.elements.length}`,
    );
  }
  variant.elements.splice(insertAt, 0, element);
  touch(variant, clock);
}

/** Set or remove a variant's heading and touch the variant. */
export function setHeading(
  variant: SceneVariant,
  heading: SceneHeading | undefined,
  clock: Clock = systemClock,
): void {
  if (heading !== undefined) {
    variant.heading = heading;
  } else {
    delete variant.heading;
  }
  touch(variant, clock);
}
