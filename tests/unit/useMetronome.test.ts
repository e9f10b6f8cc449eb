import assert from "node:assert/strict";
import test from "node:test";

import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { act, create, type ReactTestRenderer } from "react-test-renderer";

import type { MetronomeStore } from "../../src/store/metronome.store";
import { useMetronome } from "../../src/store/useMetronome";
import { FakeTimerHost } from "../support/FakeTimerHost";

Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true });

function Probe() {
  const { state, beatIndex, indicators, transport } = useMetronome({ config: { initial: { timeSignature: 3 }, debug: false } });
  return createElement(
    "span",
    null,
    `${transport.toggleLabel} ${transport.bpmLabel} ${state.timeSignature}/${indicators.length} beat ${beatIndex}`
  );
}

test("useMetronome exposes a stopped snapshot for rendering", () => {
  assert.equal(renderToStaticMarkup(createElement(Probe)), "<span>START 120 3/3 beat 0</span>");
});

test("useMetronome re-renders on ticks and stops the clock on unmount", () => {
  const timers = new FakeTimerHost();
  const storeRef: { current: MetronomeStore | null } = { current: null };
  const rendererRef: { current: ReactTestRenderer | null } = { current: null };

  function Running() {
    const metronome = useMetronome({ timers, config: { debug: false } });
    storeRef.current = metronome.store;
    return createElement("span", null, `${metronome.transport.toggleLabel} beat ${metronome.beatIndex}`);
  }

  act(() => {
    rendererRef.current = create(createElement(Running));
  });
  const store = storeRef.current;
  const renderer = rendererRef.current;
  assert.ok(store);
  assert.ok(renderer);

  act(() => {
    store.getState().start();
  });
  act(() => {
    timers.advanceBy(1000);
  });
  assert.deepEqual(renderer.root.findByType("span").children, ["STOP beat 2"]);
  assert.equal(timers.liveTimers, 1);

  act(() => {
    renderer.unmount();
  });
  assert.equal(store.getState().isRunning, false);
  assert.equal(timers.liveTimers, 0);
});
