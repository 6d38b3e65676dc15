import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ArtifactStore, toArtifactName } from '../artifact-store.js';

describe('ArtifactStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'steprunner-artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write screenshots under screenshots/ and return the relative reference', async () => {
    const store = new ArtifactStore(dir);

    const first = await store.saveScreenshot('Checkout Failure', Buffer.from('png-1'));
    const second = await store.saveScreenshot('Checkout Failure', Buffer.from('png-2'));

    expect(first).toBe('screenshots/0001-checkout-failure.png');
    expect(second).toBe('screenshots/0002-checkout-failure.png');
    expect((await readFile(path.join(dir, first))).toString()).toBe('png-1');
  });

  describe('toArtifactName', () => {
    it('should reduce names to safe file names', () => {
      expect(toArtifactName('  Login / "Email" step ')).toBe('login-email-step');
      expect(toArtifactName('***')).toBe('screenshot');
    });
  });
});
