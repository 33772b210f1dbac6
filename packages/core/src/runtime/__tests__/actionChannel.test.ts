import { assert, describe, test } from "@vellum-ui/testkit";
import { isVellumError } from "../../errors.js";
import { createActionChannel } from "../actionChannel.js";

describe("action channel", () => {
  test("drain returns actions in send order and empties the queue", () => {
    const { sender, receiver } = createActionChannel<string>();
    sender.send("a");
    sender.send("b");
    assert.equal(receiver.pending(), 2);
    assert.deepEqual(receiver.drain(), ["a", "b"]);
    assert.equal(receiver.pending(), 0);
    assert.deepEqual(receiver.drain(), []);
  });

  test("sending after close throws and nothing is buffered", () => {
    const { sender, receiver } = createActionChannel<number>();
    sender.send(1);
    receiver.close();
    assert.equal(receiver.isClosed(), true);
    assert.equal(receiver.pending(), 0);
    assert.throws(
      () => sender.send(2),
      (err: unknown) => isVellumError(err, "VELLUM_ACTION_CHANNEL_CLOSED"),
    );
    assert.equal(receiver.pending(), 0);
  });
});
