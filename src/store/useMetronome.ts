import { useEffect, useMemo, useRef } from "react";
import { useStore } from "zustand";

import { type BeatIndicator, describeTransport, layoutBeatIndicators } from "../utils/rhythm/beatIndicators";
import { createMetronomeStore, type MetronomeState, type MetronomeStore, type MetronomeStoreOptions, selectBeatIndex } from "./metronome.store";

type UseMetronomeResult = {
  state: MetronomeState;
  beatIndex: number;
  indicators: BeatIndicator[];
  transport: ReturnType<typeof describeTransport>;
  store: MetronomeStore;
};

/** Creates one metronome per component and stops it on unmount. Options are read once. */
export function useMetronome(options: MetronomeStoreOptions = {}): UseMetronomeResult {
  const storeRef = useRef<MetronomeStore | null>(null);
  if (!storeRef.current) {
    storeRef.current = createMetronomeStore(options);
  }
  const store = storeRef.current;

  const state = useStore(store);

  useEffect(
    () => () => {
      store.getState().stop();
    },
    [store]
  );

  const indicators = useMemo(
    () => layoutBeatIndicators(state),
    [state.timeSignature, state.subdivision, state.tickCount, state.isRunning]
  );

  return {
    state,
    beatIndex: selectBeatIndex(state),
    indicators,
    transport: describeTransport(state),
    store,
  };
}

export default useMetronome;
