/**
 * Core domain types for the storyboard.
 * These are plain TypeScript shapes; the storyboard and scene graph
 * operate on them through ids only.
 */

import type {
  AuthorId,
  CharacterId,
  DialogueId,
  SceneId,
  SceneVariantId,
} from "./id.ts";
import type { Metadata } from "./metadata.ts";
import type {
  AuthorName,
  CameraLocation,
  CharacterName,
  DialogueText,
  Parenthetical,
  SceneAction,
  SceneLocation,
  TimeOfDay,
} from "./values.ts";

export interface SceneHeading {
  cameraLocation: CameraLocation;
  location: SceneLocation;
  timeOfDay: TimeOfDay;
}

export type DialogueBlock =
  | { type: "text"; text: DialogueText }
  | { type: "parenthetical"; text: Parenthetical };

export interface Dialogue {
  id: DialogueId;
  scene: SceneId;
  speaker: CharacterId;
  content: DialogueBlock[];
  metadata: Metadata;
}

export type SceneElement =
  | { type: "action"; text: SceneAction }
  | { type: "dialogue"; dialogue: Dialogue };

/** One draft of a scene. */
export interface SceneVariant {
  id: SceneVariantId;
  heading?: SceneHeading;
  elements: SceneElement[];
  metadata: Metadata;
}

export interface Scene {
  id: SceneId;
  activeVariant: SceneVariantId;
  variants: SceneVariant[];
  metadata: Metadata;
}

export interface Author {
  id: AuthorId;
  name: AuthorName;
  metadata: Metadata;
}

export interface Character {
  id: CharacterId;
  name: CharacterName;
  metadata: Metadata;
}
