/**
 * Identifiers
 *
 * Every entity is named by a UUID string tagged with its kind at the type
 * level. Two ids of different kinds share a runtime representation but are
 * not assignable to each other.
 */

import { randomUUID } from "node:crypto";

export type EntityKind =
  | "scene"
  | "sceneVariant"
  | "dialogue"
  | "author"
  | "character";

export type Id<K extends EntityKind> = string & { readonly __kind: K };

export type SceneId = Id<"scene">;
export type SceneVariantId = Id<"sceneVariant">;
export type DialogueId = Id<"dialogue">;
export type AuthorId = Id<"author">;
export type CharacterId = Id<"character">;

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function brand<K extends EntityKind>(value: string): Id<K> {
  return value as Id<K>;
}

/** Generate a fresh id for an entity of the given kind. */
export function newId<K extends EntityKind>(_kind: K): Id<K> {
  return brand<K>(randomUUID());
}

/**
 * Tag an existing UUID string with an entity kind.
 * Throws when `value` is not a UUID.
 */
export function idFrom<K extends EntityKind>(_kind: K, value: string): Id<K> {
  if (!UUID_PATTERN.test(value)) {
    throw new TypeError(`Not a valid id: ${value}`);
  }
  return brand<K>(value.toLowerCase());
}

export function formatId(id: Id<EntityKind>): string {
  return id;
}
