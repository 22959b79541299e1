import { describe, it, expect } from "vitest";
import { Storyboard } from "../src/storyboard/storyboard.ts";
import { newId } from "../src/story/id.ts";
import type { SceneId } from "../src/story/id.ts";
import type { Clock } from "../src/story/metadata.ts";
import {
  createAuthor,
  createCharacter,
  createScene,
  createSceneVariant,
} from "../src/story/scene.ts";
import type { Scene, SceneElement } from "../src/story/types.ts";
import {
  ValueError,
  parseAuthorName,
  parseCharacterName,
  parseSceneAction,
  parseSummary,
  parseTitle,
} from "../src/story/values.ts";

const START = Date.UTC(2024, 0, 1);

/** Each call is one second after the previous one; the first is START + 1s. */
function fakeClock(): Clock {
  let t = START;
  return () => new Date((t += 1000));
}

function valid<T>(value: T | ValueError): T {
  if (value instanceof ValueError) throw value;
  return value;
}

function action(text: string): SceneElement {
  return { type: "action", text: valid(parseSceneAction(text)) };
}

function setup(count: number) {
  const clock = fakeClock();
  const out: string[] = [];
  const board = new Storyboard({ clock, write: (line) => out.push(line) });
  const scenes: Scene[] = [];
  for (let i = 0; i < count; i++) {
    const scene = createScene({ clock });
    board.addScene(scene);
    scenes.push(scene);
  }
  const ids = scenes.map((s) => s.id);
  return { board, clock, out, scenes, ids };
}

function versions(scenes: Scene[]): number[] {
  return scenes.map((s) => s.metadata.version);
}

describe("Storyboard structure", () => {
  it("adds a scene to the bank and the graph, touching it once", () => {
    const { board, scenes, ids } = setup(1);

    expect(board.scene(ids[0])).toBe(scenes[0]);
    expect(board.standaloneScenes()).toEqual(new Set(ids));
    expect(versions(scenes)).toEqual([2]);
  });

  it("links scenes and touches both ends", () => {
    const { board, scenes, ids } = setup(2);
    const [a, b] = ids;

    const result = board.linkScenes(a, b);

    expect(result).toEqual({ ok: true, value: { kind: "linkedScenes", from: a, dest: b } });
    expect([...board.nextScenes(a)]).toEqual([b]);
    expect(versions(scenes)).toEqual([3, 3]);
  });

  it("rejects an unknown scene before touching the graph", () => {
    const { board, scenes, ids } = setup(1);
    const [a] = ids;
    const stranger = newId("scene");

    const result = board.linkScenes(a, stranger);

    expect(result).toEqual({ ok: false, error: { kind: "unknownScene", scene: stranger } });
    expect([...board.nextScenes(a)]).toEqual([]);
    expect(versions(scenes)).toEqual([2]);
  });

  it("reports the first unknown scene in argument order", () => {
    const { board } = setup(0);
    const x = newId("scene");
    const y = newId("scene");

    expect(board.linkScenes(x, y)).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: x },
    });
    expect(board.moveScene(y, x, x)).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: y },
    });
  });

  it("rejects an unknown root or unlink without changing the graph", () => {
    const { board, scenes, ids } = setup(2);
    const [a, b] = ids;
    board.linkScenes(a, b);
    const before = versions(scenes);
    const stranger = newId("scene");

    expect(board.setSceneAsRoot(stranger)).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: stranger },
    });
    expect(board.unlinkScenes(a, stranger)).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: stranger },
    });
    expect(board.unlinkScenes(stranger, b)).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: stranger },
    });

    expect(board.roots()).toEqual([]);
    expect([...board.nextScenes(a)]).toEqual([b]);
    expect(versions(scenes)).toEqual(before);
  });

  it("marks a root and reports the scenes no root reaches", () => {
    const { board, ids } = setup(3);
    const [a, b, c] = ids;

    board.setSceneAsRoot(a);
    board.linkScenes(a, b);

    expect(board.roots()).toEqual([a]);
    expect(board.standaloneScenes()).toEqual(new Set([c]));
  });

  it("touches scene, old parent and new parent once each on a move", () => {
    const { board, scenes, ids } = setup(3);
    const [a, b, c] = ids;
    board.linkScenes(a, b);
    board.linkScenes(b, c);
    // a: 3, b: 4, c: 3

    const result = board.moveScene(c, b, a);

    expect(result.ok).toBe(true);
    expect(versions(scenes)).toEqual([4, 5, 4]);
  });

  it("touches a scene once when it is moved within the same parent", () => {
    const { board, scenes, ids } = setup(2);
    const [a, b] = ids;
    board.linkScenes(a, b);

    board.moveScene(b, a, a);

    expect(versions(scenes)).toEqual([4, 4]);
  });

  it("touches nothing when a move would create a cycle", () => {
    const { board, scenes, ids } = setup(3);
    const [a, b, c] = ids;
    board.linkScenes(a, b);
    board.linkScenes(b, c);
    const before = versions(scenes);

    const result = board.moveScene(b, a, c);

    expect(result).toEqual({ ok: false, error: { kind: "cycleDetected", scene: b, dest: c } });
    expect(versions(scenes)).toEqual(before);
    expect([...board.nextScenes(a)]).toEqual([b]);
  });

  it("unlinks scenes and keeps both in the bank", () => {
    const { board, ids } = setup(2);
    const [a, b] = ids;
    board.linkScenes(a, b);

    expect(board.unlinkScenes(a, b)).toEqual({
      ok: true,
      value: { kind: "edgeDeleted", from: a, dest: b },
    });
    expect([...board.nextScenes(a)]).toEqual([]);
    expect(board.scene(b)).not.toBeNull();
  });

  it("deletes a scene from the bank and the graph", () => {
    const { board, scenes, ids } = setup(2);
    const [a, b] = ids;
    board.setSceneAsRoot(a);
    board.linkScenes(a, b);
    // a: 4, b: 3

    const result = board.deleteScene(b);

    expect(result).toEqual({ ok: true, value: { kind: "sceneDeleted", scene: b } });
    expect(board.scene(b)).toBeNull();
    expect([...board.nextScenes(a)]).toEqual([]);
    expect(board.scenes()).toEqual([scenes[0]]);
    expect(versions(scenes)).toEqual([4, 3]);
  });

  it("treats deleting an unknown scene as a no-op", () => {
    const { board, ids } = setup(1);

    expect(board.deleteScene(newId("scene"))).toEqual({ ok: true, value: null });
    expect(board.scenes().map((s) => s.id)).toEqual(ids);
  });

  it("orders the outline by root paths, then the remaining scenes by id", () => {
    const { board, ids } = setup(6);
    const [a, b, c, d, e, f] = ids;
    board.setSceneAsRoot(a);
    board.linkScenes(a, b);
    board.linkScenes(a, c);
    board.linkScenes(b, d);

    const rest: SceneId[] = [e, f].sort();
    expect(board.outline()).toEqual([a, b, d, c, ...rest]);
  });

  it("prints the graph through the configured writer", () => {
    const { board, out, ids } = setup(2);
    const [a, b] = ids;
    board.setSceneAsRoot(a);
    board.linkScenes(a, b);

    board.printFrom();
    board.printFrom(b);

    expect(out).toEqual([`ROOT: ${a}`, `- ${a}`, `  - ${b}`, "", `- ${b}`]);
  });
});

describe("Storyboard scene content", () => {
  it("adds a variant without changing the active one", () => {
    const { board, scenes, ids } = setup(1);
    const [scene] = scenes;
    const active = scene.activeVariant;

    const result = board.addSceneVariant(ids[0]);

    expect(result.ok).toBe(true);
    expect(scene.variants).toHaveLength(2);
    expect(scene.activeVariant).toBe(active);
    expect(scene.metadata.version).toBe(3);
  });

  it("switches the active variant", () => {
    const { board, clock, scenes, ids } = setup(1);
    const [scene] = scenes;
    const draft = createSceneVariant({ clock });
    board.addSceneVariant(ids[0], draft);

    const result = board.setActiveVariant(ids[0], draft.id);

    expect(result).toEqual({ ok: true, value: scene });
    expect(scene.activeVariant).toBe(draft.id);
  });

  it("rejects a variant the scene does not have", () => {
    const { board, ids } = setup(1);
    const variant = newId("sceneVariant");

    expect(board.setActiveVariant(ids[0], variant)).toEqual({
      ok: false,
      error: { kind: "unknownVariant", scene: ids[0], variant },
    });
  });

  it("inserts elements into the active variant", () => {
    const { board, scenes, ids } = setup(1);
    const [scene] = scenes;
    const first = action("The door creaks open.");
    const second = action("A cat walks in.");

    board.addSceneElement(ids[0], first);
    const result = board.addSceneElement(ids[0], second, { index: 0 });

    expect(result.ok).toBe(true);
    expect(scene.variants[0].elements).toEqual([second, first]);
    expect(scene.variants[0].metadata.version).toBe(3);
    expect(scene.metadata.version).toBe(4);
  });

  it("rejects an element index outside the variant", () => {
    const { board, scenes, ids } = setup(1);
    const [scene] = scenes;
    board.addSceneElement(ids[0], action("Rain."));

    expect(board.addSceneElement(ids[0], action("Thunder."), { index: -5 })).toEqual({
      ok: false,
      error: { kind: "indexOutOfRange", scene: ids[0], index: -5, length: 1 },
    });
    expect(board.addSceneElement(ids[0], action("Thunder."), { index: 2 })).toEqual({
      ok: false,
      error: { kind: "indexOutOfRange", scene: ids[0], index: 2, length: 1 },
    });
    expect(scene.variants[0].elements).toEqual([action("Rain.")]);
    expect(scene.metadata.version).toBe(3);

    expect(board.addSceneElement(ids[0], action("Thunder."), { index: 1 }).ok).toBe(true);
    expect(scene.variants[0].elements).toEqual([action("Rain."), action("Thunder.")]);
  });

  it("rejects content edits on an unknown scene", () => {
    const { board } = setup(0);
    const stranger = newId("scene");

    expect(board.addSceneVariant(stranger)).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: stranger },
    });
    expect(board.addSceneElement(stranger, action("Rain."))).toEqual({
      ok: false,
      error: { kind: "unknownScene", scene: stranger },
    });
  });
});

describe("Storyboard project details", () => {
  it("starts with the given title and template", () => {
    const title = valid(parseTitle("Night Shift"));
    const board = new Storyboard({ clock: fakeClock(), title, template: "teleplay" });

    expect(board.title).toBe("Night Shift");
    expect(board.template).toBe("teleplay");
    expect(board.summary).toBeUndefined();
    expect(board.metadata.version).toBe(1);
    expect(board.metadata.createdAt).toBe("2024-01-01T00:00:01.000Z");
  });

  it("touches the storyboard on every project-level edit", () => {
    const clock = fakeClock();
    const board = new Storyboard({ clock });

    board.updateTitle(valid(parseTitle("Night Shift")));
    expect(board.metadata.version).toBe(2);
    expect(board.metadata.updatedAt).toBe("2024-01-01T00:00:02.000Z");

    board.clearTitle();
    expect(board.title).toBeUndefined();
    expect(board.metadata.version).toBe(3);

    board.updateTemplate("novel");
    expect(board.template).toBe("novel");
    expect(board.metadata.version).toBe(4);
  });

  it("touches the storyboard when the summary or template is cleared", () => {
    const board = new Storyboard({ clock: fakeClock(), template: "screenplay" });

    board.updateSummary(valid(parseSummary("Two strangers share a night bus.")));
    expect(board.summary).toBe("Two strangers share a night bus.");
    expect(board.metadata.version).toBe(2);

    board.clearSummary();
    expect(board.summary).toBeUndefined();
    expect(board.metadata.version).toBe(3);

    board.clearTemplate();
    expect(board.template).toBeUndefined();
    expect(board.metadata.version).toBe(4);
    expect(board.metadata.updatedAt).toBe("2024-01-01T00:00:04.000Z");
  });

  it("adds and removes characters", () => {
    const clock = fakeClock();
    const board = new Storyboard({ clock });
    const character = createCharacter(valid(parseCharacterName("Night Clerk")), clock);

    board.addCharacter(character);
    expect(board.character(character.id)).toBe(character);
    expect(board.characters()).toEqual([character]);
    expect(board.metadata.version).toBe(2);

    expect(board.removeCharacter(newId("character"))).toBe(false);
    expect(board.metadata.version).toBe(2);

    expect(board.removeCharacter(character.id)).toBe(true);
    expect(board.character(character.id)).toBeNull();
    expect(board.characters()).toEqual([]);
    expect(board.metadata.version).toBe(3);
  });

  it("adds and removes authors", () => {
    const clock = fakeClock();
    const board = new Storyboard({ clock });
    const author = createAuthor(valid(parseAuthorName("Test Writer")), clock);

    board.addAuthor(author);
    expect(board.author(author.id)).toBe(author);
    expect(board.metadata.version).toBe(2);

    expect(board.removeAuthor(newId("author"))).toBe(false);
    expect(board.metadata.version).toBe(2);

    expect(board.removeAuthor(author.id)).toBe(true);
    expect(board.authors()).toEqual([]);
    expect(board.metadata.version).toBe(3);
  });
});
