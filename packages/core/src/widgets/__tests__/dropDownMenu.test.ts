import { assert, createManualTimers, describe, test } from "@vellum-ui/testkit";
import type { Primitive } from "../../drawlist/primitives.js";
import { type Point, point, size } from "../../layout/types.js";
import { createActionChannel } from "../../runtime/actionChannel.js";
import { type PointerInput, createView } from "../../runtime/view.js";
import {
  type DropDownMenuProps,
  MENU_DIVIDER,
  type MenuEntry,
  createDropDownMenu,
  menuOption,
} from "../dropDownMenu.js";
import { defaultDropDownMenuStyle } from "../menuStyle.js";

const style = defaultDropDownMenuStyle();

/*
 * Default metrics: rows 26 high, outer padding 4, divider 1 wide with 2 above
 * and below. "Open" + "Ctrl+O" is the widest row at 130.
 *
 *   option 0: 4..30   divider: y 32   option 2: 35..61   size 138 x 65
 */
const ENTRIES: readonly MenuEntry[] = [menuOption("Open", 1, "Ctrl+O"), MENU_DIVIDER, menuOption("Quit", 2)];

function setup(props: Partial<DropDownMenuProps<string>> = {}) {
  const warnings: string[] = [];
  const channel = createActionChannel<string>();
  const view = createView<string>({
    windowSize: size(200, 100),
    actions: channel.sender,
    config: { timers: createManualTimers(), devMode: true, warn: (m) => warnings.push(m) },
    env: {},
  });
  const menu = createDropDownMenu(view, {
    style,
    entries: ENTRIES,
    position: point(10, 10),
    zIndex: 10,
    onEntrySelected: (id) => `selected:${String(id)}`,
    ...props,
  });
  return { view, warnings, actions: channel.receiver, menu };
}

const move = (p: Point): PointerInput => ({ kind: "moved", position: p });
const press = (p: Point): PointerInput => ({ kind: "pressed", position: p, button: "primary" });

function textsOf(primitives: readonly Primitive[]): string[] {
  const out: string[] = [];
  for (const p of primitives) if (p.kind === "text") out.push(p.text);
  return out;
}

describe("DropDownMenu - opening", () => {
  test("starts closed with an empty rect at its position", () => {
    const { view, menu } = setup();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 0, h: 0 });
    assert.equal(view.render().length, 0);
  });

  test("open sizes the menu to its rows and takes focus", () => {
    const { view, menu } = setup();
    menu.open();
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 138, h: 65 });
    assert.equal(view.focusedElement(), menu.el.id);
    assert.deepEqual([...view.takeRepaintRequests()], [menu.el.id]);
  });

  test("open at a position near the corner is pushed back inside the window", () => {
    const { view, warnings, menu } = setup();
    menu.open(point(150, 60));
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 62, y: 35, w: 138, h: 65 });
    assert.deepEqual(warnings, []);
  });

  test("a menu larger than the window is clipped and reported", () => {
    const { view, warnings, menu } = setup();
    view.setWindowSize(size(100, 50));
    menu.open();
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 0, y: 0, w: 100, h: 50 });
    const id = String(menu.el.id);
    assert.deepEqual(warnings, [
      `[vellum][overlay] element #${id}: menu width 138 exceeds window width 100; content is clipped`,
      `[vellum][overlay] element #${id}: menu height 65 exceeds window height 50; content is clipped`,
    ]);
  });

  test("moving an open menu re-contains it", () => {
    const { view, menu } = setup();
    menu.open();
    view.flushUpdates();
    menu.setPosition(point(190, 10));
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 62, y: 10, w: 138, h: 65 });
  });
});

describe("DropDownMenu - pointer", () => {
  test("hovering an option highlights it; the divider highlights nothing", () => {
    const { view, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.takeRepaintRequests();

    view.handlePointer(move(point(20, 30)));
    assert.deepEqual([...view.takeRepaintRequests()], [menu.el.id]);
    assert.equal(view.cursorIcon(), "pointer");
    assert.equal(view.hoveredElement(), menu.el.id);

    view.handlePointer(move(point(21, 30)));
    assert.deepEqual([...view.takeRepaintRequests()], []);

    view.handlePointer(move(point(20, 43)));
    assert.deepEqual([...view.takeRepaintRequests()], [menu.el.id]);
    assert.equal(view.cursorIcon(), "default");
  });

  test("pressing an option sends its id and closes the menu", () => {
    const { view, actions, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.handlePointer(press(point(20, 50)));
    assert.deepEqual(actions.drain(), ["selected:2"]);
    assert.equal(view.focusedElement(), null);
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 0, h: 0 });
  });

  test("pressing the divider keeps the menu open", () => {
    const { view, actions, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.handlePointer(press(point(20, 43)));
    assert.deepEqual(actions.drain(), []);
    assert.equal(view.focusedElement(), menu.el.id);
  });

  test("a press outside closes the menu without selecting", () => {
    const { view, actions, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.handlePointer(press(point(190, 95)));
    assert.deepEqual(actions.drain(), []);
    assert.equal(view.focusedElement(), null);
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 0, h: 0 });
  });

  test("the menu can be reopened after closing", () => {
    const { view, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.handlePointer(press(point(190, 95)));
    menu.open();
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 138, h: 65 });
    assert.equal(view.focusedElement(), menu.el.id);
  });

  test("an undefined selection action is reported and the menu still closes", () => {
    const { view, actions, warnings, menu } = setup({ onEntrySelected: () => undefined });
    menu.open();
    view.flushUpdates();
    view.handlePointer(press(point(20, 20)));
    assert.deepEqual(actions.drain(), []);
    assert.deepEqual(warnings, [
      `[vellum][action] element #${String(menu.el.id)}: onEntrySelected returned undefined; no action was sent`,
    ]);
    assert.equal(view.focusedElement(), null);
  });
});

describe("DropDownMenu - handle", () => {
  test("the last setEntries before a drain wins", () => {
    const { view, actions, menu } = setup();
    menu.setEntries([menuOption("A", 5)]);
    menu.setEntries([menuOption("B", 7), menuOption("C", 8)]);
    menu.open();
    view.flushUpdates();
    // "B" is 7 wide plus 20 of padding: 27 + 8 by 4 + 2 * 26 + 4.
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 35, h: 60 });
    view.handlePointer(press(point(20, 50)));
    assert.deepEqual(actions.drain(), ["selected:8"]);
  });

  test("entries and a style in one drain measure with the new style", () => {
    const { view, menu } = setup();
    menu.setStyle(defaultDropDownMenuStyle({ outerPadding: 10 }));
    menu.setEntries([menuOption("B", 7)]);
    menu.open();
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 47, h: 46 });
  });

  test("a style change while open resizes and repaints", () => {
    const { view, menu } = setup({ entries: [menuOption("B", 7)] });
    menu.open();
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 35, h: 34 });
    view.takeRepaintRequests();

    menu.setStyle(defaultDropDownMenuStyle({ outerPadding: 10 }));
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 47, h: 46 });
    assert.deepEqual([...view.takeRepaintRequests()], [menu.el.id]);
  });

  test("setting the current style object does not notify", () => {
    const { view, menu } = setup();
    menu.setStyle(menu.style());
    assert.equal(view.hasPendingUpdates(), false);
  });

  test("entries replaced while closed keep the menu collapsed", () => {
    const { view, menu } = setup();
    menu.setEntries([menuOption("B", 7)]);
    view.flushUpdates();
    assert.deepEqual(view.elementRect(menu.el.id), { x: 10, y: 10, w: 0, h: 0 });
    assert.equal(view.focusedElement(), null);
  });
});

describe("DropDownMenu - rendering", () => {
  test("background, hover highlight, then texts and dividers on top", () => {
    const { view, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.handlePointer(move(point(20, 30)));

    const [frame] = view.render();
    assert.equal(frame?.id, menu.el.id);
    const entries = frame?.primitives.entries() ?? [];
    assert.deepEqual(
      entries.map((e) => `${e.kind}@${String(e.zIndex)}`),
      ["single@0", "single@1", "textBatch@2", "solidQuadBatch@2"],
    );

    const [back, hover, texts, dividers] = entries;
    if (back?.kind !== "single" || back.primitive.kind !== "quad") throw new Error("expected a quad");
    assert.deepEqual(back.primitive.rect, { x: 0, y: 0, w: 138, h: 65 });
    assert.equal(back.primitive.style, style.backQuad);

    if (hover?.kind !== "single" || hover.primitive.kind !== "quad") throw new Error("expected a quad");
    assert.deepEqual(hover.primitive.rect, { x: 4, y: 4, w: 130, h: 26 });
    assert.equal(hover.primitive.style, style.textBgQuadHover);

    if (texts?.kind !== "textBatch") throw new Error("expected a text batch");
    assert.deepEqual(
      texts.primitives.map((t) => [t.text, t.origin.x, t.origin.y]),
      [
        ["Open", 14, 9],
        ["Ctrl+O", 82, 9],
        ["Quit", 14, 40],
      ],
    );

    if (dividers?.kind !== "solidQuadBatch") throw new Error("expected a divider batch");
    assert.deepEqual(
      dividers.primitives.map((d) => d.rect),
      [{ x: 4, y: 32, w: 130, h: 1 }],
    );
  });

  test("a closed menu paints nothing and a reopened one has no highlight", () => {
    const { view, menu } = setup();
    menu.open();
    view.flushUpdates();
    view.handlePointer(move(point(20, 30)));
    view.handlePointer(press(point(190, 95)));
    assert.equal(view.render().length, 0);

    menu.open();
    view.flushUpdates();
    const flat = view.render()[0]?.primitives.flatten() ?? [];
    assert.deepEqual(textsOf(flat), ["Open", "Ctrl+O", "Quit"]);
    assert.equal(flat.filter((p) => p.kind === "quad").length, 1);
  });
});
