import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigManager } from './ConfigManager.js';

describe('ConfigManager', () => {
  let dir: string;
  let credentialsPath: string;
  const manager = new ConfigManager();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'track-info-config-'));
    credentialsPath = path.join(dir, 'credentials.txt');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses key = value lines, ignoring comments and key case', async () => {
    await writeFile(credentialsPath, [
      '# SPOTIFY_CLIENT_ID=commented-out',
      'spotify_client_id = test-client',
      'SPOTIFY_CLIENT_SECRET=test-secret\r',
      ''
    ].join('\n'));

    await expect(manager.parseCredentials(credentialsPath)).resolves.toEqual({
      clientId: 'test-client',
      clientSecret: 'test-secret'
    });
  });

  it('reports placeholder and missing values', async () => {
    await writeFile(credentialsPath, 'SPOTIFY_CLIENT_ID=tu_spotify_client_id_aqui\n');

    const result = await manager.validateCredentialsFile(credentialsPath);

    expect(result.isValid).toBe(false);
    expect(result.missingFields).toEqual(['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET']);
    expect(result.errors).toEqual(['Missing or empty credentials: SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET']);
  });

  it('reports a missing file', async () => {
    const result = await manager.validateCredentialsFile(credentialsPath);

    expect(result).toEqual({ isValid: false, missingFields: [], errors: ['Credentials file does not exist'] });
    await expect(manager.parseCredentials(credentialsPath)).rejects.toThrow(
      'Invalid credentials file: Credentials file does not exist'
    );
  });

  it('prefers environment variables over the file', async () => {
    await writeFile(credentialsPath, 'SPOTIFY_CLIENT_ID=file-client\nSPOTIFY_CLIENT_SECRET=file-secret\n');

    const fromEnv = await manager.loadCredentials(credentialsPath, {
      SPOTIFY_CLIENT_ID: ' env-client ',
      SPOTIFY_CLIENT_SECRET: 'env-secret'
    });
    const fromFile = await manager.loadCredentials(credentialsPath, { SPOTIFY_CLIENT_ID: 'env-client' });

    expect(fromEnv).toEqual({ clientId: 'env-client', clientSecret: 'env-secret' });
    expect(fromFile).toEqual({ clientId: 'file-client', clientSecret: 'file-secret' });
  });

  it('creates a template that does not validate until filled in', async () => {
    const nested = path.join(dir, 'nested', 'credentials.txt');

    const created = await manager.createCredentialsTemplate(nested);

    expect(created).toBe(nested);
    expect(await readFile(nested, 'utf8')).toContain('SPOTIFY_CLIENT_SECRET=tu_spotify_client_secret_aqui');
    expect((await manager.validateCredentialsFile(nested)).isValid).toBe(false);
  });

  it('does not overwrite an existing credentials file', async () => {
    await writeFile(credentialsPath, 'SPOTIFY_CLIENT_ID=a\nSPOTIFY_CLIENT_SECRET=b\n');

    await manager.createCredentialsTemplate(credentialsPath);

    expect(await readFile(credentialsPath, 'utf8')).toBe('SPOTIFY_CLIENT_ID=a\nSPOTIFY_CLIENT_SECRET=b\n');
  });
});
