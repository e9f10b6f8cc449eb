import assert from "node:assert/strict";
import test from "node:test";

import { describeTransport, layoutBeatIndicators } from "../../src/utils/rhythm/beatIndicators";

const rounded = (n: number) => Math.round(n) + 0;

test("indicators sit evenly on the circle", () => {
  const indicators = layoutBeatIndicators({ timeSignature: 4, subdivision: 1, tickCount: 0, isRunning: false });

  assert.deepEqual(
    indicators.map((i) => [i.index, rounded(i.x), rounded(i.y)]),
    [
      [0, 100, 0],
      [1, 0, 100],
      [2, -100, 0],
      [3, 0, -100],
    ]
  );
  assert.ok(indicators.every((i) => !i.isActive));
});

test("only the current beat is lit while running", () => {
  const indicators = layoutBeatIndicators({ timeSignature: 4, subdivision: 2, tickCount: 5, isRunning: true }, 50);

  assert.deepEqual(
    indicators.map((i) => i.isActive),
    [false, false, true, false]
  );
  assert.equal(rounded(indicators[2].x), -50);
});

test("describeTransport labels the toggle and truncates bpm", () => {
  assert.deepEqual(describeTransport({ bpm: 96.7, isRunning: true }), {
    toggleLabel: "STOP",
    bpmLabel: "96",
    bpmLocked: true,
  });
  assert.deepEqual(describeTransport({ bpm: 120, isRunning: false }), {
    toggleLabel: "START",
    bpmLabel: "120",
    bpmLocked: false,
  });
});
