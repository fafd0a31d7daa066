import * as fsp from "fs/promises";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { InvalidInputError } from "../src/errors";
import { MixSession } from "../src/services/MixSession";
import { SessionManager } from "../src/services/SessionManager";
import type { StreamInfo } from "../src/types";
import { createStreamInfo } from "../src/utils/streamLabel";

const streams: StreamInfo[] = [0, 1].map((streamIndex) =>
  createStreamInfo({
    index: streamIndex + 1,
    streamIndex,
    codecName: "aac",
    sampleRate: 48000,
    channels: 2,
  })
);

async function exists(target: string): Promise<boolean> {
  return fsp
    .access(target)
    .then(() => true)
    .catch(() => false);
}

describe("MixSession", () => {
  const sessions: MixSession[] = [];

  async function newSession() {
    const session = await MixSession.create();
    sessions.push(session);
    return session;
  }

  afterEach(async () => {
    await Promise.all(sessions.splice(0).map((session) => session.dispose()));
  });

  it("owns a temp directory until disposed", async () => {
    const session = await newSession();

    expect(path.basename(session.directory)).toMatch(/^audio_mixer_/);
    expect(await exists(session.directory)).toBe(true);

    await session.dispose();
    expect(await exists(session.directory)).toBe(false);
    // a second dispose is a no-op
    await session.dispose();
  });

  it("keeps uploads inside its uploads folder", async () => {
    const session = await newSession();

    expect(session.filePath("../../etc/movie.mkv")).toBe(
      path.join(session.directory, "uploads", "movie.mkv")
    );
    expect(await exists(path.join(session.directory, "uploads"))).toBe(true);
  });

  it("never stores an upload at the mix output path", async () => {
    const session = await newSession();

    expect(session.filePath("mixed_output.mp4")).not.toBe(session.outputPath());
    expect(session.filePath("mixed_output.mp4")).toBe(
      path.join(session.directory, "uploads", "mixed_output.mp4")
    );
  });

  it("starts every stream at 100% when a source is loaded", async () => {
    const session = await newSession();
    session.loadSource("/tmp/movie.mkv", "movie.mkv", streams);

    expect(session.sourcePath).toBe("/tmp/movie.mkv");
    expect(session.audioStreams).toHaveLength(2);
    expect(session.volumeMap()).toEqual(
      new Map([
        [0, 1],
        [1, 1],
      ])
    );
  });

  it("converts slider percentages to multipliers", async () => {
    const session = await newSession();
    session.loadSource("/tmp/movie.mkv", "movie.mkv", streams);

    session.setVolume(0, 0);
    session.setVolume(1, 150);

    expect(session.getVolume(1)).toBe(150);
    expect(session.volumeMap()).toEqual(
      new Map([
        [0, 0],
        [1, 1.5],
      ])
    );
  });

  it("rejects unknown streams and off-slider volumes", async () => {
    const session = await newSession();
    session.loadSource("/tmp/movie.mkv", "movie.mkv", streams);

    expect(() => session.setVolume(2, 50)).toThrow("Unknown audio stream: 2");
    expect(() => session.setVolume(0, 205)).toThrow(InvalidInputError);
    expect(() => session.setVolume(0, 42)).toThrow(InvalidInputError);
  });

  it("resets volumes and the last output when a new source arrives", async () => {
    const session = await newSession();
    session.loadSource("/tmp/first.mkv", "first.mkv", streams);
    session.setVolume(0, 50);
    session.markMixed(session.outputPath());

    session.loadSource("/tmp/second.mp4", "second.mp4", streams.slice(0, 1));

    expect(session.mixedOutputPath).toBeUndefined();
    expect(session.volumeMap()).toEqual(new Map([[0, 1]]));
  });

  it("names the download after the source", async () => {
    const session = await newSession();
    session.loadSource("/tmp/holiday.trip.mkv", "holiday.trip.mkv", streams);

    expect(session.outputPath()).toBe(
      path.join(session.directory, "mixed_output.mp4")
    );
    expect(session.downloadName()).toBe("holiday.trip_mixed.mp4");
  });
});

describe("SessionManager", () => {
  function fakeSession() {
    return {
      lastActivity: Date.now(),
      touch: vi.fn(),
      dispose: vi.fn(async () => {}),
    };
  }

  function managerWith(created: Array<ReturnType<typeof fakeSession>>) {
    const factory = vi.fn(async () => {
      const session = fakeSession();
      created.push(session);
      return session as unknown as MixSession;
    });
    return { factory, manager: new SessionManager(factory) };
  }

  it("creates a session on first use and reuses it", async () => {
    const created: Array<ReturnType<typeof fakeSession>> = [];
    const { manager, factory } = managerWith(created);

    const first = await manager.getOrCreateSession(7);
    const second = await manager.getOrCreateSession(7);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(manager.getSession(7)).toBe(first);
    expect(manager.getSession(8)).toBeUndefined();
  });

  it("creates only one session for concurrent first requests", async () => {
    const { manager, factory } = managerWith([]);

    const [a, b] = await Promise.all([
      manager.getOrCreateSession(1),
      manager.getOrCreateSession(1),
    ]);

    expect(a).toBe(b);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("disposes deleted sessions", async () => {
    const created: Array<ReturnType<typeof fakeSession>> = [];
    const { manager } = managerWith(created);
    await manager.getOrCreateSession(1);

    await expect(manager.deleteSession(1)).resolves.toBe(true);
    await expect(manager.deleteSession(1)).resolves.toBe(false);
    expect(created[0].dispose).toHaveBeenCalledTimes(1);
    expect(manager.size).toBe(0);
  });

  it("expires idle sessions", async () => {
    const created: Array<ReturnType<typeof fakeSession>> = [];
    const { manager } = managerWith(created);
    await manager.getOrCreateSession(1);
    await manager.getOrCreateSession(2);
    created[0].lastActivity = Date.now() - 25 * 60 * 60 * 1000;

    await expect(manager.cleanupOldSessions(24)).resolves.toBe(1);
    expect(manager.getSession(1)).toBeUndefined();
    expect(manager.getSession(2)).toBeDefined();
    expect(created[0].dispose).toHaveBeenCalled();
  });

  it("disposes everything on destroy", async () => {
    const created: Array<ReturnType<typeof fakeSession>> = [];
    const { manager } = managerWith(created);
    await manager.getOrCreateSession(1);
    await manager.getOrCreateSession(2);

    await manager.destroy();

    expect(manager.size).toBe(0);
    expect(created.every((session) => session.dispose.mock.calls.length === 1)).toBe(true);
  });
});
