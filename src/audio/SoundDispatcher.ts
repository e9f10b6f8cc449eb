import { type Logger, silentLogger } from "../core/debug/logger";
import type { TickKind } from "../core/types";

export interface SoundDispatcher {
  playAccent(): void;
  playSubdivision(): void;
}

export type SamplePlayer = {
  play: () => void;
};

export type SampleName = "tick" | "tock";

/** Resolves a named sample to something playable, or null when it is not bundled. */
export type SampleLoader = (name: SampleName) => Promise<SamplePlayer | null>;

export type SampleLoadResult = { ok: boolean; details?: string };

export type LoadedSoundDispatcher = {
  dispatcher: SoundDispatcher;
  results: Record<SampleName, SampleLoadResult>;
};

export const silentSoundDispatcher: SoundDispatcher = {
  playAccent: () => {},
  playSubdivision: () => {},
};

export function createSampleSoundDispatcher(players: { accent?: SamplePlayer | null; subdivision?: SamplePlayer | null }): SoundDispatcher {
  const accent = players.accent ?? null;
  const subdivision = players.subdivision ?? null;
  return {
    playAccent: () => accent?.play(),
    playSubdivision: () => subdivision?.play(),
  };
}

async function loadSample(
  loader: SampleLoader,
  name: SampleName,
  logger: Logger
): Promise<{ player: SamplePlayer | null; result: SampleLoadResult }> {
  try {
    const player = await loader(name);
    if (!player) {
      logger.warn(`sample "${name}" not found; that tick stays silent`);
      return { player: null, result: { ok: false, details: "not found" } };
    }
    return { player, result: { ok: true } };
  } catch (e: unknown) {
    const details = e instanceof Error ? e.message : String(e);
    logger.warn(`sample "${name}" failed to load:`, details);
    return { player: null, result: { ok: false, details } };
  }
}

/** "tick" plays on accents, "tock" on subdivisions. Missing samples degrade to silence. */
export async function loadSampleSoundDispatcher(loader: SampleLoader, logger: Logger = silentLogger): Promise<LoadedSoundDispatcher> {
  const [tick, tock] = await Promise.all([loadSample(loader, "tick", logger), loadSample(loader, "tock", logger)]);
  return {
    dispatcher: createSampleSoundDispatcher({ accent: tick.player, subdivision: tock.player }),
    results: { tick: tick.result, tock: tock.result },
  };
}

export function dispatchTick(dispatcher: SoundDispatcher, kind: TickKind) {
  if (kind === "accent") {
    dispatcher.playAccent();
  } else {
    dispatcher.playSubdivision();
  }
}
