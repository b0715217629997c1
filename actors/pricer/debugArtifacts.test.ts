import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RenderSession } from './browser';
import { DebugArtifacts } from './debugArtifacts';

function writeScreenshot(dir: string, name: string, modifiedAtSecs: number) {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, 'png');
  fs.utimesSync(filePath, modifiedAtSecs, modifiedAtSecs);
  return filePath;
}

function fakeSession(): RenderSession {
  return {
    findFirstMatching: vi.fn(async () => null),
    screenshot: vi.fn(async (target: string) => {
      fs.writeFileSync(target, 'png');
    }),
    close: vi.fn(async () => undefined),
  };
}

describe('DebugArtifacts', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pricewatch-debug-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should keep only the newest screenshots by modification time', async () => {
    const oldest = writeScreenshot(testDir, 'debug-screenshot-1.png', 1_000);
    const older = writeScreenshot(testDir, 'debug-screenshot-2.png', 2_000);
    writeScreenshot(testDir, 'debug-screenshot-3.png', 3_000);
    writeScreenshot(testDir, 'debug-screenshot-4.png', 4_000);

    const artifacts = new DebugArtifacts({ directory: testDir, limit: 2 });
    const removed = await artifacts.prune();

    expect(removed.sort()).toEqual([oldest, older].sort());
    expect(fs.readdirSync(testDir).sort()).toEqual([
      'debug-screenshot-3.png',
      'debug-screenshot-4.png',
    ]);
  });

  it('should leave unrelated files alone', async () => {
    writeScreenshot(testDir, 'debug-screenshot-1.png', 1_000);
    writeScreenshot(testDir, 'notes.txt', 500);

    const artifacts = new DebugArtifacts({ directory: testDir, limit: 0 });
    await artifacts.prune();

    expect(fs.readdirSync(testDir)).toEqual(['notes.txt']);
  });

  it('should capture a screenshot named after the current time and prune', async () => {
    writeScreenshot(testDir, 'debug-screenshot-1.png', 1_000);
    const session = fakeSession();
    const artifacts = new DebugArtifacts({
      directory: testDir,
      limit: 1,
      now: () => new Date(1_767_225_600_000),
    });

    const saved = await artifacts.capture(session);

    const expected = path.join(testDir, 'debug-screenshot-1767225600000.png');
    expect(saved).toBe(expected);
    expect(session.screenshot).toHaveBeenCalledWith(expected);
    expect(fs.readdirSync(testDir)).toEqual(['debug-screenshot-1767225600000.png']);
  });

  it('should not capture when the limit is zero', async () => {
    const session = fakeSession();
    const artifacts = new DebugArtifacts({ directory: testDir, limit: 0 });

    expect(await artifacts.capture(session)).toBeNull();
    expect(session.screenshot).not.toHaveBeenCalled();
  });

  it('should report a failed screenshot without throwing', async () => {
    const session = fakeSession();
    vi.mocked(session.screenshot).mockRejectedValueOnce(new Error('page crashed'));
    const artifacts = new DebugArtifacts({ directory: testDir, limit: 3 });

    expect(await artifacts.capture(session)).toBeNull();
  });
});
