import { assert, describe, test } from "@vellum-ui/testkit";
import {
  type TextPrimitive,
  createPrimitiveGroup,
  quadPrimitive,
  solidQuadPrimitive,
} from "../primitives.js";
import { point, rect, size } from "../../layout/types.js";
import { DEFAULT_TEXT_PROPERTIES, WHITE, quadStyle, rgba, solid } from "../../widgets/style.js";

function text(s: string): TextPrimitive {
  return {
    kind: "text",
    text: s,
    origin: point(0, 0),
    clipSize: size(10, 10),
    color: WHITE,
    properties: DEFAULT_TEXT_PROPERTIES,
  };
}

describe("PrimitiveGroup", () => {
  test("flatten orders by z-index and keeps insertion order inside a z-index", () => {
    const group = createPrimitiveGroup();
    const back = quadPrimitive(quadStyle(solid(rgba(1, 1, 1))), rect(0, 0, 10, 10));
    group.setZIndex(2);
    group.addTextBatch([text("a"), text("b")]);
    group.setZIndex(0);
    group.add(back);
    group.setZIndex(1);
    group.addText(text("c"));

    const flat = group.flatten().map((p) => (p.kind === "text" ? p.text : p.kind));
    assert.deepEqual(flat, ["quad", "c", "a", "b"]);
  });

  test("a batch is recorded as one entry and empty batches are dropped", () => {
    const group = createPrimitiveGroup();
    group.addTextBatch([]);
    group.addSolidQuadBatch([
      solidQuadPrimitive(rect(0, 0, 1, 1), WHITE),
      solidQuadPrimitive(rect(0, 2, 1, 1), WHITE),
    ]);
    const entries = group.entries();
    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.kind, "solidQuadBatch");
    assert.equal(entries[0]?.zIndex, 0);
  });
});
