/**
 * packages/testkit/src/recorder.ts — Call recorder for widget callbacks.
 */

export type Recorder<T, R> = Readonly<{
  /** Records its argument and returns `produce(arg)`. */
  fn: (arg: T) => R;
  calls(): readonly T[];
  count(): number;
  reset(): void;
}>;

export function createRecorder<T, R = T>(produce: (arg: T) => R): Recorder<T, R> {
  let calls: T[] = [];
  return Object.freeze({
    fn: (arg: T) => {
      calls.push(arg);
      return produce(arg);
    },
    calls: () => Object.freeze([...calls]),
    count: () => calls.length,
    reset: () => {
      calls = [];
    },
  });
}
