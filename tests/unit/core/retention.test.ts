import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { enforceRetention, listResident } from '../../../src/core/retention.js';

async function writeArtifact(dir: string, name: string, size: number, mtimeSeconds: number): Promise<void> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, Buffer.alloc(size));
  await fs.utimes(filePath, mtimeSeconds, mtimeSeconds);
}

async function residentNames(dir: string): Promise<string[]> {
  return (await listResident(dir)).map(a => a.filename);
}

describe('enforceRetention', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-retention-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should do nothing when the budget is zero or negative', async () => {
    await writeArtifact(tempDir, 'a.zip', 500, 1_000);
    await writeArtifact(tempDir, 'b.zip', 500, 2_000);

    expect(await enforceRetention(tempDir, 0)).toEqual({ evicted: [], remainingCount: 2, remainingBytes: 1_000 });
    expect(await enforceRetention(tempDir, -1)).toEqual({ evicted: [], remainingCount: 2, remainingBytes: 1_000 });
  });

  it('should evict by modification time, not by name', async () => {
    await writeArtifact(tempDir, 'c-oldest.zip', 100, 1_000);
    await writeArtifact(tempDir, 'a-middle.zip', 100, 2_000);
    await writeArtifact(tempDir, 'b-newest.zip', 100, 3_000);

    const result = await enforceRetention(tempDir, 250);

    expect(result.evicted.map(a => a.filename)).toEqual(['c-oldest.zip']);
    expect(result.remainingBytes).toBe(200);
    expect(await residentNames(tempDir)).toEqual(['a-middle.zip', 'b-newest.zip']);
  });

  it('should keep evicting until the total fits', async () => {
    await writeArtifact(tempDir, 'one.zip', 60, 1_000);
    await writeArtifact(tempDir, 'two.zip', 60, 2_000);
    await writeArtifact(tempDir, 'three.zip', 60, 3_000);
    await writeArtifact(tempDir, 'four.zip', 60, 4_000);

    const result = await enforceRetention(tempDir, 130);

    expect(result.evicted.map(a => a.filename)).toEqual(['one.zip', 'two.zip']);
    expect(result).toMatchObject({ remainingCount: 2, remainingBytes: 120 });
  });

  it('should evict a lone artifact that alone exceeds the budget', async () => {
    await writeArtifact(tempDir, 'huge.tar.gz', 300, 1_000);

    const result = await enforceRetention(tempDir, 200);

    expect(result.evicted.map(a => a.filename)).toEqual(['huge.tar.gz']);
    expect(result).toMatchObject({ remainingCount: 0, remainingBytes: 0 });
    expect(await residentNames(tempDir)).toEqual([]);
  });

  it('should keep the newest artifact under the keep-newest policy', async () => {
    await writeArtifact(tempDir, 'old.tar.gz', 100, 1_000);
    await writeArtifact(tempDir, 'huge.tar.gz', 300, 2_000);

    const result = await enforceRetention(tempDir, 200, 'keep-newest');

    expect(result.evicted.map(a => a.filename)).toEqual(['old.tar.gz']);
    expect(result).toMatchObject({ remainingCount: 1, remainingBytes: 300 });
  });

  it('should break modification time ties by name', async () => {
    await writeArtifact(tempDir, 'b.zip', 100, 1_000);
    await writeArtifact(tempDir, 'a.zip', 100, 1_000);

    const result = await enforceRetention(tempDir, 150);

    expect(result.evicted.map(a => a.filename)).toEqual(['a.zip']);
  });

  it('should ignore hidden partial files and directories', async () => {
    await writeArtifact(tempDir, '.incoming.zip.abcd.partial', 1_000, 500);
    await fs.mkdir(path.join(tempDir, 'subdir'));
    await writeArtifact(tempDir, 'a.zip', 100, 1_000);

    const result = await enforceRetention(tempDir, 150);

    expect(result).toEqual({ evicted: [], remainingCount: 1, remainingBytes: 100 });
    const onDisk = (await fs.readdir(tempDir)).sort();
    expect(onDisk).toEqual(['.incoming.zip.abcd.partial', 'a.zip', 'subdir']);
  });
});
