import { assert, createManualTimers, describe, test } from "@vellum-ui/testkit";
import { isVellumError } from "../../errors.js";
import { ALIGN2_TOP_CENTER, type Point, type Rect, point, rect, size } from "../../layout/types.js";
import { createActionChannel } from "../actionChannel.js";
import {
  ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE,
  ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS,
  ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED,
  ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE,
  ELEMENT_FLAG_PAINTS,
  type ElementContext,
  type ElementEvent,
  type EventCaptureStatus,
} from "../element.js";
import { type PointerInput, createView } from "../view.js";

const INSIDE = ELEMENT_FLAG_PAINTS | ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS;

type Handler = (event: ElementEvent, cx: ElementContext<string>) => EventCaptureStatus | undefined;

function describeEvent(event: ElementEvent): string {
  switch (event.kind) {
    case "pointer": {
      const p = event.event;
      if (p.kind === "moved") return p.justEntered ? "moved+entered" : "moved";
      return p.kind;
    }
    case "exclusiveFocus":
      return `focus:${String(event.focused)}`;
    default:
      return event.kind;
  }
}

function setup() {
  const timers = createManualTimers();
  const warnings: string[] = [];
  const channel = createActionChannel<string>();
  const view = createView<string>({
    windowSize: size(200, 100),
    actions: channel.sender,
    config: { timers, hoverTimeoutMs: 100, devMode: true, warn: (m) => warnings.push(m) },
    env: {},
  });
  const log: string[] = [];

  function add(
    name: string,
    flags: number,
    bounds: Rect,
    opts: { zIndex?: number; handler?: Handler; capture?: boolean } = {},
  ) {
    return view.addElement({
      element: {
        flags: () => flags,
        onEvent: (event, cx) => {
          log.push(`${name}:${describeEvent(event)}`);
          const res = opts.handler?.(event, cx);
          if (res !== undefined) return res;
          return opts.capture === false ? "notCaptured" : "captured";
        },
        renderPrimitives: () => undefined,
      },
      zIndex: opts.zIndex,
      boundingRect: bounds,
    });
  }

  const move = (p: Point): PointerInput => ({ kind: "moved", position: p });
  const press = (p: Point): PointerInput => ({ kind: "pressed", position: p, button: "primary" });
  const release = (p: Point): PointerInput => ({ kind: "released", position: p, button: "primary" });

  return { view, timers, warnings, channel, log, add, move, press, release };
}

describe("View - pointer routing", () => {
  test("the topmost element under the pointer captures first", () => {
    const { view, log, add, move } = setup();
    add("low", INSIDE, rect(0, 0, 50, 50));
    add("high", INSIDE, rect(0, 0, 50, 50), { zIndex: 1 });
    view.handlePointer(move(point(10, 10)));
    assert.deepEqual(log, ["high:moved+entered"]);
  });

  test("uncaptured events fall through to lower elements", () => {
    const { view, log, add, move } = setup();
    add("low", INSIDE, rect(0, 0, 50, 50));
    add("high", INSIDE, rect(0, 0, 50, 50), { zIndex: 1, capture: false });
    view.handlePointer(move(point(10, 10)));
    assert.deepEqual(log, ["high:moved+entered", "low:moved+entered"]);
    assert.equal(view.hoveredElement(), 1);
  });

  test("justEntered is only set when the hovered element changes, and the old one gets left", () => {
    const { view, log, add, move } = setup();
    add("a", INSIDE, rect(0, 0, 50, 50));
    add("b", INSIDE, rect(100, 0, 50, 50));
    view.handlePointer(move(point(10, 10)));
    view.handlePointer(move(point(12, 10)));
    view.handlePointer(move(point(110, 10)));
    view.handlePointer({ kind: "leftWindow" });
    assert.deepEqual(log, ["a:moved+entered", "a:moved", "b:moved+entered", "a:left", "b:left"]);
    assert.equal(view.hoveredElement(), null);
  });

  test("hidden elements and elements without the inside flag are not hit", () => {
    const { view, log, add, move } = setup();
    const hidden = add("hidden", INSIDE, rect(0, 0, 50, 50));
    hidden.setHidden(true);
    add("deaf", ELEMENT_FLAG_PAINTS, rect(0, 0, 50, 50));
    view.handlePointer(move(point(10, 10)));
    assert.deepEqual(log, []);
  });

  test("the cursor icon resets to default on every move", () => {
    const { view, add, move } = setup();
    add("a", INSIDE, rect(0, 0, 50, 50), {
      handler: (_e, cx) => {
        cx.setCursorIcon("pointer");
        return undefined;
      },
    });
    view.handlePointer(move(point(10, 10)));
    assert.equal(view.cursorIcon(), "pointer");
    view.handlePointer(move(point(150, 10)));
    assert.equal(view.cursorIcon(), "default");
  });

  test("handlePointer from inside a handler is rejected", () => {
    const { view, add, move } = setup();
    add("a", INSIDE, rect(0, 0, 50, 50), {
      handler: () => {
        view.handlePointer(move(point(1, 1)));
        return undefined;
      },
    });
    assert.throws(
      () => view.handlePointer(move(point(10, 10))),
      (err: unknown) => isVellumError(err, "VELLUM_REENTRANT_DISPATCH"),
    );
    // The view stays usable afterwards.
    view.handlePointer({ kind: "leftWindow" });
  });
});

describe("View - deferred notifications", () => {
  test("notifications wait for flushUpdates", () => {
    const { view, log, add } = setup();
    const a = add("a", INSIDE, rect(0, 0, 50, 50));
    a.notifyCustomStateChange();
    a.notifyCustomStateChange();
    assert.deepEqual(log, []);
    assert.equal(view.hasPendingUpdates(), true);
    view.flushUpdates();
    assert.deepEqual(log, ["a:customStateChanged", "a:customStateChanged"]);
    assert.equal(view.hasPendingUpdates(), false);
  });

  test("a notification raised inside a handler is delivered after the handler returns", () => {
    const { view, log, add, move } = setup();
    const b = add("b", INSIDE, rect(100, 0, 50, 50));
    add("a", INSIDE, rect(0, 0, 50, 50), {
      handler: (event) => {
        if (event.kind === "pointer") {
          b.notifyCustomStateChange();
          log.push("a:returning");
        }
        return undefined;
      },
    });
    view.handlePointer(move(point(10, 10)));
    assert.deepEqual(log, ["a:moved+entered", "a:returning", "b:customStateChanged"]);
  });

  test("pending notifications are delivered before the next pointer event", () => {
    const { view, log, add, move } = setup();
    const a = add("a", INSIDE, rect(0, 0, 50, 50));
    a.notifyCustomStateChange();
    view.handlePointer(move(point(10, 10)));
    assert.deepEqual(log, ["a:customStateChanged", "a:moved+entered"]);
  });

  test("setPos queues positionChanged only for listeners that actually moved", () => {
    const { view, log, add } = setup();
    const a = add("a", INSIDE | ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE, rect(0, 0, 10, 10));
    const b = add("b", INSIDE, rect(0, 0, 10, 10));
    a.setPos(point(0, 0));
    a.setPos(point(5, 5));
    b.setPos(point(5, 5));
    view.flushUpdates();
    assert.deepEqual(log, ["a:positionChanged"]);
    assert.deepEqual(a.rect(), { x: 5, y: 5, w: 10, h: 10 });
    assert.deepEqual(view.elementRect(b.id), { x: 5, y: 5, w: 10, h: 10 });
  });

  test("rect changes requested by the element do not emit positionChanged", () => {
    const { view, log, add } = setup();
    const a = add("a", INSIDE | ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE, rect(0, 0, 10, 10), {
      handler: (event, cx) => {
        if (event.kind === "customStateChanged") cx.setBoundingRect(rect(20, 20, 5, 5));
        return undefined;
      },
    });
    a.notifyCustomStateChange();
    view.flushUpdates();
    assert.deepEqual(log, ["a:customStateChanged"]);
    assert.deepEqual(a.rect(), { x: 20, y: 20, w: 5, h: 5 });
  });
});

describe("View - focus and clicked-off", () => {
  test("stealing focus notifies the previous and the new holder after dispatch", () => {
    const { view, log, add, press } = setup();
    const flags = INSIDE | ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE;
    const steal: Handler = (event, cx) => {
      if (event.kind === "pointer" && event.event.kind === "buttonPressed") cx.stealTemporaryFocus();
      return undefined;
    };
    const a = add("a", flags, rect(0, 0, 50, 50), { handler: steal });
    const b = add("b", flags, rect(100, 0, 50, 50), { handler: steal });

    view.handlePointer(press(point(10, 10)));
    assert.equal(view.focusedElement(), a.id);
    view.handlePointer(press(point(110, 10)));
    assert.equal(view.focusedElement(), b.id);
    assert.deepEqual(log, ["a:buttonPressed", "a:focus:true", "b:buttonPressed", "a:focus:false", "b:focus:true"]);
  });

  test("releaseFocus is a no-op for an element without focus", () => {
    const { view, log, add } = setup();
    const a = add("a", INSIDE | ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE, rect(0, 0, 50, 50), {
      handler: (event, cx) => {
        if (event.kind === "customStateChanged") cx.releaseFocus();
        return undefined;
      },
    });
    a.notifyCustomStateChange();
    view.flushUpdates();
    assert.deepEqual(log, ["a:customStateChanged"]);
  });

  test("clickedOff is delivered once for a press outside the listener", () => {
    const { view, log, add, press } = setup();
    const a = add("a", INSIDE, rect(0, 0, 50, 50), {
      handler: (event, cx) => {
        if (event.kind === "customStateChanged") cx.listenToPointerClickedOff();
        return undefined;
      },
    });
    a.notifyCustomStateChange();
    view.flushUpdates();
    view.handlePointer(press(point(10, 10)));
    view.handlePointer(press(point(150, 80)));
    view.handlePointer(press(point(150, 80)));
    assert.deepEqual(log, ["a:customStateChanged", "a:buttonPressed", "a:clickedOff"]);
  });

  test("the focused element listening outside its bounds sees events first", () => {
    const { view, log, add, press, move } = setup();
    const flags =
      INSIDE | ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE | ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED;
    add("under", INSIDE, rect(100, 0, 50, 50));
    add("menu", flags, rect(0, 0, 50, 50), {
      capture: false,
      handler: (event, cx) => {
        if (event.kind === "pointer" && event.event.kind === "buttonPressed") cx.stealTemporaryFocus();
        return undefined;
      },
    });
    view.handlePointer(press(point(10, 10)));
    log.length = 0;
    view.handlePointer(move(point(110, 10)));
    assert.deepEqual(log, ["menu:moved+entered", "under:moved+entered"]);
  });
});

describe("View - hover timeout and tooltip", () => {
  function hoverSetup() {
    const s = setup();
    const a = s.add("a", INSIDE, rect(0, 0, 50, 50), {
      handler: (event, cx) => {
        if (event.kind !== "pointer") return undefined;
        if (event.event.kind === "moved" && event.event.justEntered) cx.startHoverTimeout();
        if (event.event.kind === "hoverTimeout") {
          cx.showTooltip({ message: "tip", elementBounds: cx.rect(), align: ALIGN2_TOP_CENTER });
        }
        return undefined;
      },
    });
    s.add("b", INSIDE, rect(100, 0, 50, 50));
    return { ...s, a };
  }

  test("fires after the configured delay while the pointer rests", () => {
    const { view, timers, log, a, move } = hoverSetup();
    view.handlePointer(move(point(10, 10)));
    timers.advance(99);
    assert.equal(view.tooltip(), null);
    timers.advance(1);
    assert.deepEqual(log, ["a:moved+entered", "a:hoverTimeout"]);
    assert.deepEqual(view.tooltip(), {
      ownerId: a.id,
      info: { message: "tip", elementBounds: { x: 0, y: 0, w: 50, h: 50 }, align: ALIGN2_TOP_CENTER },
    });
  });

  test("moving inside the element restarts the countdown", () => {
    const { view, timers, log, a, move } = hoverSetup();
    view.handlePointer(move(point(10, 10)));
    timers.advance(60);
    view.handlePointer(move(point(11, 10)));
    timers.advance(60);
    assert.equal(view.tooltip(), null);
    assert.deepEqual(log, ["a:moved+entered", "a:moved"]);
    timers.advance(40);
    assert.deepEqual(log, ["a:moved+entered", "a:moved", "a:hoverTimeout"]);
    assert.equal(view.tooltip()?.ownerId, a.id);
    assert.equal(timers.pending(), 0);
  });

  test("leaving the element cancels the countdown", () => {
    const { view, timers, log, move } = hoverSetup();
    view.handlePointer(move(point(10, 10)));
    view.handlePointer(move(point(110, 10)));
    timers.advance(100);
    assert.deepEqual(log, ["a:moved+entered", "b:moved+entered", "a:left"]);
    assert.equal(view.tooltip(), null);
  });

  test("moves after the tooltip fired do not start another countdown", () => {
    const { view, timers, move } = hoverSetup();
    view.handlePointer(move(point(10, 10)));
    timers.advance(100);
    view.handlePointer(move(point(12, 10)));
    assert.equal(timers.pending(), 0);
  });

  test("the tooltip is cleared when the pointer moves to another element", () => {
    const { view, timers, move } = hoverSetup();
    view.handlePointer(move(point(10, 10)));
    timers.advance(100);
    assert.notEqual(view.tooltip(), null);
    view.handlePointer(move(point(110, 10)));
    assert.equal(view.tooltip(), null);
  });
});

describe("View - rendering and lifecycle", () => {
  test("render walks painting, visible, non-empty elements by z-index", () => {
    const { view, add } = setup();
    const top = add("top", INSIDE, rect(0, 0, 10, 10), { zIndex: 5 });
    const bottom = add("bottom", INSIDE, rect(0, 0, 10, 10));
    add("empty", INSIDE, rect(0, 0, 0, 10));
    add("hidden", INSIDE, rect(0, 0, 10, 10)).setHidden(true);
    add("deaf", ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS, rect(0, 0, 10, 10));
    assert.deepEqual(
      view.render().map((r) => r.id),
      [bottom.id, top.id],
    );
  });

  test("repaint requests are collected until taken", () => {
    const { view, add } = setup();
    const a = add("a", INSIDE, rect(0, 0, 10, 10), {
      handler: (_e, cx) => {
        cx.requestRepaint();
        return undefined;
      },
    });
    a.notifyCustomStateChange();
    view.flushUpdates();
    assert.deepEqual([...view.takeRepaintRequests()], [a.id]);
    assert.deepEqual([...view.takeRepaintRequests()], []);
  });

  test("actions sent by elements reach the channel", () => {
    const { view, channel, add } = setup();
    const a = add("a", INSIDE, rect(0, 0, 10, 10), {
      handler: (_e, cx) => {
        cx.sendAction("hello");
        return undefined;
      },
    });
    a.notifyCustomStateChange();
    view.flushUpdates();
    assert.deepEqual(channel.receiver.drain(), ["hello"]);
  });

  test("element warnings go through the dev log with the element id", () => {
    const { view, warnings, add } = setup();
    const a = add("a", INSIDE, rect(0, 0, 10, 10), {
      handler: (_e, cx) => {
        cx.warn("view", "k", "something odd");
        return undefined;
      },
    });
    a.notifyCustomStateChange();
    a.notifyCustomStateChange();
    view.flushUpdates();
    assert.deepEqual(warnings, [`[vellum][view] element #${String(a.id)}: something odd`]);
  });

  test("a removed element drops its queued events and rejects geometry calls", () => {
    const { view, log, add } = setup();
    const a = add("a", INSIDE, rect(0, 0, 10, 10));
    a.notifyCustomStateChange();
    a.remove();
    a.notifyCustomStateChange();
    view.flushUpdates();
    assert.deepEqual(log, []);
    assert.equal(view.hasElement(a.id), false);
    assert.throws(
      () => a.setPos(point(1, 1)),
      (err: unknown) => isVellumError(err, "VELLUM_UNKNOWN_ELEMENT"),
    );
  });
});
