/**
 * Validated text values and enumerations.
 *
 * Text input is normalized with `trimInput` and then checked in a fixed
 * order: empty, too long, control characters. Parsers return either the
 * branded value or a `ValueError`; they never throw.
 */

import { type } from "arktype";

export const NAME_MAX_LENGTH = 100;

export type TextField =
  | "title"
  | "summary"
  | "authorName"
  | "characterName"
  | "sceneLocation"
  | "sceneAction"
  | "dialogueText"
  | "parenthetical"
  | "revisionNote";

export type OptionField = "storyTemplate" | "cameraLocation" | "timeOfDay";

export type ValueErrorCode = "empty" | "tooLong" | "controlChars" | "unknownOption";

export class ValueError extends Error {
  readonly code: ValueErrorCode;
  readonly field: TextField | OptionField;

  constructor(code: ValueErrorCode, field: TextField | OptionField, detail?: string) {
    super(describe(code, field, detail));
    this.name = "ValueError";
    this.code = code;
    this.field = field;
  }
}

function describe(code: ValueErrorCode, field: string, detail?: string): string {
  switch (code) {
    case "empty":
      return `${field} is empty`;
    case "tooLong":
      return `${field} exceeds ${NAME_MAX_LENGTH} characters`;
    case "controlChars":
      return `${field} contains control characters`;
    case "unknownOption":
      return `${field} ${detail ?? "is not a known option"}`;
  }
}

/** Trim and collapse every run of whitespace to a single space. */
export function trimInput(input: string): string {
  return input.trim().split(/\s+/).filter(Boolean).join(" ");
}

// ── Text values ────────────────────────────────────────────────────────

export type TextValue<F extends TextField> = string & { readonly __field: F };

export type Title = TextValue<"title">;
export type Summary = TextValue<"summary">;
export type AuthorName = TextValue<"authorName">;
export type CharacterName = TextValue<"characterName">;
export type SceneLocation = TextValue<"sceneLocation">;
export type SceneAction = TextValue<"sceneAction">;
export type DialogueText = TextValue<"dialogueText">;
export type Parenthetical = TextValue<"parenthetical">;
export type RevisionNote = TextValue<"revisionNote">;

const NonEmpty = type("string > 0");
// Counted in code points, so astral characters count once.
const WithinNameLimit = type("string").narrow(
  (s) => [...s].length <= NAME_MAX_LENGTH,
);
const CONTROL_CHAR = /\p{Cc}/u;
const Printable = type("string").narrow((s) => !CONTROL_CHAR.test(s));

interface TextRules {
  bounded?: boolean;
  allowControlChars?: boolean;
}

function checkText<F extends TextField>(
  field: F,
  input: string,
  rules: TextRules = {},
): TextValue<F> | ValueError {
  const text = trimInput(input);
  if (!NonEmpty.allows(text)) return new ValueError("empty", field);
  if (rules.bounded && !WithinNameLimit.allows(text)) {
    return new ValueError("tooLong", field);
  }
  if (!rules.allowControlChars && !Printable.allows(text)) {
    return new ValueError("controlChars", field);
  }
  return text as TextValue<F>;
}

export function parseTitle(input: string): Title | ValueError {
  return checkText("title", input, { bounded: true });
}

/** The title a storyboard shows before one is chosen. */
export function defaultTitle(): Title {
  const title = parseTitle("Untitled Storyboard");
  if (title instanceof ValueError) throw title;
  return title;
}

export function parseSummary(input: string): Summary | ValueError {
  return checkText("summary", input);
}

export function parseAuthorName(input: string): AuthorName | ValueError {
  return checkText("authorName", input, { bounded: true });
}

export function parseCharacterName(input: string): CharacterName | ValueError {
  return checkText("characterName", input, { bounded: true });
}

export function parseSceneLocation(input: string): SceneLocation | ValueError {
  return checkText("sceneLocation", input);
}

export function parseSceneAction(input: string): SceneAction | ValueError {
  return checkText("sceneAction", input);
}

export function parseDialogueText(input: string): DialogueText | ValueError {
  return checkText("dialogueText", input);
}

// Parentheticals carry stage directions verbatim; only emptiness is checked.
export function parseParenthetical(input: string): Parenthetical | ValueError {
  return checkText("parenthetical", input, { allowControlChars: true });
}

export function parseRevisionNote(input: string): RevisionNote | ValueError {
  return checkText("revisionNote", input);
}

// ── Enumerations ───────────────────────────────────────────────────────

export const StoryTemplate = type(
  "'teleplay' | 'screenplay' | 'halfHourSitcom' | 'novel'",
);
export type StoryTemplate = typeof StoryTemplate.infer;

export const CameraLocation = type("'interior' | 'exterior'");
export type CameraLocation = typeof CameraLocation.infer;

export const TimeOfDay = type(
  "'morning' | 'dawn' | 'day' | 'dusk' | 'evening' | 'night' | 'later' | 'continuous'",
);
export type TimeOfDay = typeof TimeOfDay.infer;

export function parseStoryTemplate(input: string): StoryTemplate | ValueError {
  const out = StoryTemplate(input);
  if (out instanceof type.errors) {
    return new ValueError("unknownOption", "storyTemplate", out.summary);
  }
  return out;
}

export function parseCameraLocation(input: string): CameraLocation | ValueError {
  const out = CameraLocation(input);
  if (out instanceof type.errors) {
    return new ValueError("unknownOption", "cameraLocation", out.summary);
  }
  return out;
}

export function parseTimeOfDay(input: string): TimeOfDay | ValueError {
  const out = TimeOfDay(input);
  if (out instanceof type.errors) {
    return new ValueError("unknownOption", "timeOfDay", out.summary);
  }
  return out;
}
