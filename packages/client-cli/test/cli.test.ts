import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadClientConfig, parseArgs } from '../src/cli.js';

const DEST = '4' + 'B'.repeat(94);
const ALICE = '4' + 'A'.repeat(94);

describe('parseArgs', () => {
  it('splits command options from client settings', () => {
    const parsed = parseArgs(['send', '--operator', 'alice', '--dest', DEST, '--amount', '1.5', '--mock-signer']);

    expect(parsed).toEqual({
      command: { command: 'send', destination: DEST, amount: '1.5', priority: 0 },
      settings: ['--operator', 'alice', '--mock-signer'],
    });
  });

  it('reads provisioning options', () => {
    const parsed = parseArgs([
      'provision',
      '--view-key',
      'ab'.repeat(32),
      '--wallet-address',
      ALICE,
      '--restore-height',
      '3100000',
      '--wallet-name',
      'alice-view',
    ]);

    expect(parsed.command).toEqual({
      command: 'provision',
      viewKey: 'ab'.repeat(32),
      walletAddress: ALICE,
      restoreHeight: 3_100_000,
      walletName: 'alice-view',
    });
  });

  it('applies history and sync defaults', () => {
    expect(parseArgs(['history']).command).toEqual({ command: 'history', limit: 20, minHeight: 0 });
    expect(parseArgs(['sync']).command).toEqual({ command: 'sync', all: true });
    expect(parseArgs(['sync', '--new-only']).command).toEqual({ command: 'sync', all: false });
    expect(parseArgs(['watch']).command).toEqual({ command: 'watch' });
  });

  it('requires a known command', () => {
    expect(() => parseArgs([])).toThrow('A command is required');
    expect(() => parseArgs(['spend'])).toThrow('Unknown command: spend');
  });

  it('requires the options a command cannot run without', () => {
    expect(() => parseArgs(['provision', '--wallet-address', ALICE])).toThrow('--view-key is required');
    expect(() => parseArgs(['send', '--dest', DEST])).toThrow('--amount is required');
    expect(() => parseArgs(['send', '--amount', '1', '--dest'])).toThrow('--dest needs a value');
  });

  it('validates option values', () => {
    expect(() => parseArgs(['send', '--dest', DEST, '--amount', '1.0000000000001'])).toThrow(
      'Invalid send arguments: amount: Must be an XMR amount with at most 12 decimals',
    );
    expect(() => parseArgs(['send', '--dest', 'nowhere', '--amount', '1'])).toThrow(
      'Invalid send arguments: destination: Must be a base58 wallet address',
    );
    expect(() => parseArgs(['history', '--limit', 'ten'])).toThrow('--limit must be an integer, got "ten"');
    expect(() => parseArgs(['send', '--dest', DEST, '--amount', '1', '--priority', '4'])).toThrow(
      'Invalid send arguments: priority:',
    );
  });
});

describe('client configuration', () => {
  it('needs only an operator id', async () => {
    const config = await loadClientConfig(['--operator', 'alice'], {});

    expect(config).toMatchObject({
      operatorId: 'alice',
      address: 'cold-client',
      relayAddress: 'relay',
      bridgeUrl: 'ws://localhost:8787',
      signerRpcUrl: 'http://127.0.0.1:18083/json_rpc',
      mockSigner: false,
      logLevel: 'warn',
      mtu: 465,
    });
    expect(config.retry.maxAttempts).toBe(5);
  });

  it('layers file, environment and flags in that order', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'coldmesh-client-'));
    const file = join(dir, 'client.json');
    await writeFile(file, JSON.stringify({ operatorId: 'from-file', relayAddress: 'relay-7', mtu: 300 }));

    const config = await loadClientConfig(['--config', file, '--mtu', '250'], {
      COLDMESH_OPERATOR: 'from-env',
      COLDMESH_MTU: '280',
      COLDMESH_MOCK_SIGNER: 'true',
    });

    expect(config.operatorId).toBe('from-env');
    expect(config.relayAddress).toBe('relay-7');
    expect(config.mtu).toBe(250);
    expect(config.mockSigner).toBe(true);
  });

  it('rejects a missing operator and unknown arguments', async () => {
    await expect(loadClientConfig([], {})).rejects.toThrow('Invalid client configuration: operatorId: Required');
    await expect(loadClientConfig(['--operator', 'alice', '--bogus'], {})).rejects.toThrow(
      'Unknown argument: --bogus',
    );
  });
});
