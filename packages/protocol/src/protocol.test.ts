import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ManualClock } from '@backstop/core';
import { CONFIG_FILE_NAME } from '@backstop/config';
import {
  BackstopErrorCode,
  LogLevel,
  NotFoundError,
  StateError,
  ValidationError,
  createLogger,
  silentLogger,
} from '@backstop/types';
import type { LogEntry } from '@backstop/types';
import { createProtocol, loadProtocol, venueAccounts } from './protocol';
import type { BackstopProtocol } from './protocol';

const START = 1_700_000_000;

describe('createProtocol', () => {
  let protocol: BackstopProtocol;
  let logs: LogEntry[];

  beforeEach(() => {
    logs = [];
    protocol = createProtocol({
      config: { protocolFeeBps: 500 },
      clock: new ManualClock(START),
      logger: createLogger({ level: LogLevel.INFO, output: (entry) => logs.push(entry) }),
    });
  });

  it('resolves configuration over the defaults', () => {
    expect(protocol.config.protocolFeeBps).toBe(500);
    expect(protocol.config.minUnderwriters).toBe(2);
    expect(protocol.pool.address).toBe('underwriter-pool');
  });

  it('rejects invalid configuration', () => {
    expect(() => createProtocol({ config: { protocolFeeBps: 20_000 } })).toThrow(ValidationError);
  });

  it('derives venue accounts from the venue id', () => {
    expect(venueAccounts('venue-1')).toEqual({ vault: 'vault:venue-1', engine: 'engine:venue-1' });
  });

  it('registers a venue with its vault, engine and pool binding', () => {
    const engine = protocol.registerVenue('admin-1', {
      venueId: 'venue-1',
      owner: 'owner-1',
      promisedRevenue: 900n,
      totalMonths: 12,
      operators: ['op-1'],
    });

    expect(protocol.engineOf('venue-1')).toBe(engine);
    expect(engine.admin).toBe('admin-1');
    expect(engine.isOperator('op-1')).toBe(true);
    expect(protocol.registry.ownerOf('venue-1')).toBe('owner-1');
    expect(protocol.registry.vaultAddressOf('venue-1')).toBe('vault:venue-1');
    expect(protocol.pool.engineOf('venue-1')).toBe('engine:venue-1');
    expect(protocol.venues()).toEqual(['venue-1']);

    const [entry] = protocol.journal.entries();
    expect(entry?.event).toBe('venue:registered');
    expect(entry?.payload).toBe(
      '{"engine":"engine:venue-1","owner":"owner-1","vault":"vault:venue-1","venueId":"venue-1"}',
    );
    expect(logs.map((l) => l.message)).toEqual(['venue registered']);
    expect(logs[0]).toMatchObject({ level: 'INFO', component: 'backstop', venueId: 'venue-1' });
  });

  it('keeps nothing from a registration that fails', () => {
    protocol.registerVenue('admin-1', { venueId: 'venue-1', owner: 'owner-1', promisedRevenue: 900n, totalMonths: 12 });

    const duplicate = (): unknown =>
      protocol.registerVenue('admin-1', { venueId: 'venue-1', owner: 'owner-2', promisedRevenue: 1n, totalMonths: 1 });
    expect(duplicate).toThrow(StateError);
    expect(() =>
      protocol.registerVenue('admin-1', { venueId: 'venue-2', owner: 'owner-2', promisedRevenue: 1n, totalMonths: 0 }),
    ).toThrow(ValidationError);

    expect(protocol.registry.ownerOf('venue-1')).toBe('owner-1');
    expect(protocol.registry.venueExists('venue-2')).toBe(false);
    expect(protocol.pool.engineOf('venue-2')).toBeUndefined();
    expect(protocol.venues()).toEqual(['venue-1']);
    expect(protocol.journal.size).toBe(1);
  });

  it('reports unknown venues', () => {
    let caught: unknown;
    try {
      protocol.engineOf('ghost');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(NotFoundError);
    expect(caught).toMatchObject({ code: BackstopErrorCode.VENUE_NOT_FOUND });
  });

  it('verifies its journal', () => {
    protocol.registerVenue('admin-1', { venueId: 'venue-1', owner: 'owner-1', promisedRevenue: 900n, totalMonths: 12 });
    expect(protocol.verifyJournal()).toEqual({ valid: true, entries: 1 });
  });

  it('keeps a registration and its journal entry when a listener throws', () => {
    protocol.events.on('venue:registered', () => {
      throw new Error('listener failed');
    });

    const engine = protocol.registerVenue('admin-1', {
      venueId: 'venue-1',
      owner: 'owner-1',
      promisedRevenue: 900n,
      totalMonths: 12,
    });

    expect(protocol.engineOf('venue-1')).toBe(engine);
    expect(protocol.journal.size).toBe(1);
    expect(logs.map((l) => l.message)).toEqual(['venue registered', 'post-commit callback failed']);
    expect(logs[1]).toMatchObject({
      level: 'ERROR',
      component: 'backstop.transactor',
      error: { name: 'Error', message: 'listener failed' },
    });
  });
});

describe('loadProtocol', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'backstop-protocol-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('layers the config file, the environment and explicit settings', () => {
    writeFileSync(join(root, CONFIG_FILE_NAME), JSON.stringify({ protocolFeeBps: 300, minUnderwriters: 3 }));

    const protocol = loadProtocol({
      cwd: root,
      env: { BACKSTOP_TREASURY: 'treasury-2', BACKSTOP_PROTOCOL_FEE_BPS: '400' },
      config: { minUnderwriters: 4 },
      logger: silentLogger,
    });

    expect(protocol.config.protocolFeeBps).toBe(400);
    expect(protocol.config.treasury).toBe('treasury-2');
    expect(protocol.config.minUnderwriters).toBe(4);
  });

  it('takes the log level of its default logger from the environment', () => {
    const protocol = loadProtocol({ cwd: root, env: { BACKSTOP_LOG_LEVEL: 'error' } });
    expect(protocol.config.logLevel).toBe(LogLevel.ERROR);
    expect(protocol.logger.getLevel()).toBe(LogLevel.ERROR);
  });

  it('rejects an invalid environment value', () => {
    expect(() => loadProtocol({ cwd: root, env: { BACKSTOP_PROTOCOL_FEE_BPS: 'lots' } })).toThrow(ValidationError);
  });
});
