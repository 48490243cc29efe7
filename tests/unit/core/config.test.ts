import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import YAML from 'yaml';
import {
  ledgerPathFor,
  loadAgentConfig,
  loadStoreConfig,
  stagingDirFor,
} from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('config loading', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-config-test-'));
    configPath = path.join(tempDir, 'config.yml');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('loadAgentConfig', () => {
    it('should apply defaults for optional settings', async () => {
      await fs.writeFile(configPath, YAML.stringify({
        stream: 'alpha',
        watch_directory: '/backups/alpha',
        receiver_url: 'http://store:8080/backup',
      }), 'utf8');

      const config = await loadAgentConfig(configPath);

      expect(config).toEqual({
        stream: 'alpha',
        watch_directory: '/backups/alpha',
        receiver_url: 'http://store:8080/backup',
        backup_extensions: ['.tar.gz', '.zip', '.tar'],
        upload_timeout_seconds: 600,
        stability: { interval_seconds: 2, required_matches: 3, timeout_seconds: 60 },
      });
      expect(ledgerPathFor(config)).toBe(path.join('/backups/alpha', '.delivery-ledger.csv'));
    });

    it('should honour an explicit ledger path', async () => {
      await fs.writeFile(configPath, YAML.stringify({
        stream: 'alpha',
        watch_directory: '/backups/alpha',
        receiver_url: 'http://store:8080/backup',
        ledger_path: '/var/lib/relay/alpha.csv',
      }), 'utf8');

      expect(ledgerPathFor(await loadAgentConfig(configPath))).toBe('/var/lib/relay/alpha.csv');
    });

    it('should name the missing fields', async () => {
      await fs.writeFile(configPath, 'stream: alpha\nwatch_directory: /backups\n', 'utf8');

      const err = await loadAgentConfig(configPath).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConfigError);
      expect(String(err)).toContain('receiver_url: Required');
    });

    it('should reject a missing file', async () => {
      await expect(loadAgentConfig(path.join(tempDir, 'absent.yml'))).rejects.toBeInstanceOf(ConfigError);
    });

    it('should reject unparseable YAML', async () => {
      await fs.writeFile(configPath, 'stream: [unclosed\n', 'utf8');
      await expect(loadAgentConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('loadStoreConfig', () => {
    it('should parse streams with retention defaults', async () => {
      await fs.writeFile(configPath, [
        'port: 9090',
        'streams:',
        '  alpha:',
        '    archive_path: /archive/alpha',
        '    max_size_gb: 10',
        '  beta:',
        '    archive_path: /archive/beta',
        '    max_size_gb: 0',
        '    retention: keep-newest',
        '',
      ].join('\n'), 'utf8');

      const config = await loadStoreConfig(configPath);

      expect(config.host).toBe('0.0.0.0');
      expect(config.port).toBe(9090);
      expect(config.streams.alpha).toEqual({ archive_path: '/archive/alpha', max_size_gb: 10, retention: 'oldest-first' });
      expect(config.streams.beta.retention).toBe('keep-newest');
      expect(stagingDirFor(config)).toBe(path.join(os.tmpdir(), 'backup-relay-staging'));
    });

    it('should require at least one stream', async () => {
      await fs.writeFile(configPath, 'streams: {}\n', 'utf8');
      await expect(loadStoreConfig(configPath)).rejects.toThrow('at least one stream must be configured');
    });

    it('should reject an unknown retention policy', async () => {
      await fs.writeFile(configPath, YAML.stringify({
        streams: { alpha: { archive_path: '/a', max_size_gb: 1, retention: 'newest-first' } },
      }), 'utf8');
      await expect(loadStoreConfig(configPath)).rejects.toThrow('streams.alpha.retention');
    });
  });
});
