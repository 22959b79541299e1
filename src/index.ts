/**
 * storyline-core — Public API
 *
 * The single entry point for the storyboard model. Callers issue
 * structural edits through `Storyboard`; the scene graph, values and
 * constructors are exported for direct use and testing.
 */

// Identifiers
export { newId, idFrom, formatId } from "./story/id.ts";
export type {
  EntityKind,
  Id,
  SceneId,
  SceneVariantId,
  DialogueId,
  AuthorId,
  CharacterId,
} from "./story/id.ts";

// Domain types
export type {
  Author,
  Character,
  Dialogue,
  DialogueBlock,
  Scene,
  SceneElement,
  SceneHeading,
  SceneVariant,
} from "./story/types.ts";

// Values
export {
  NAME_MAX_LENGTH,
  ValueError,
  trimInput,
  defaultTitle,
  parseTitle,
  parseSummary,
  parseAuthorName,
  parseCharacterName,
  parseSceneLocation,
  parseSceneAction,
  parseDialogueText,
  parseParenthetical,
  parseRevisionNote,
  parseStoryTemplate,
  parseCameraLocation,
  parseTimeOfDay,
  StoryTemplate,
  CameraLocation,
  TimeOfDay,
} from "./story/values.ts";
export type {
  TextField,
  OptionField,
  ValueErrorCode,
  TextValue,
  Title,
  Summary,
  AuthorName,
  CharacterName,
  SceneLocation,
  SceneAction,
  DialogueText,
  Parenthetical,
  RevisionNote,
} from "./story/values.ts";

// Metadata
export {
  systemClock,
  createMetadata,
  touch,
  addRevisionNote,
  addTag,
  removeTag,
  setLocked,
} from "./story/metadata.ts";
export type { Clock, Metadata, HasMetadata } from "./story/metadata.ts";

// Constructors & content mutations
export {
  createScene,
  createSceneVariant,
  createDialogue,
  createAuthor,
  createCharacter,
  findVariant,
  getActiveVariant,
  addDialogueBlock,
  insertElement,
  isInsertionIndex,
  setHeading,
} from "./story/scene.ts";

// Scene graph
export { SceneGraph } from "./graph/sceneGraph.ts";
export { affectedScenes } from "./graph/updates.ts";
export type { StoryboardUpdate } from "./graph/updates.ts";
export { ok, err, describeError } from "./graph/errors.ts";
export type { Result, StoryboardError } from "./graph/errors.ts";

// Storyboard
export { Storyboard } from "./storyboard/storyboard.ts";
export type { StoryboardOptions } from "./storyboard/storyboard.ts";
export { computeSceneOrder } from "./storyboard/sceneOrdering.ts";
