/**
 * Tests for store-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { openStore } from '../../../../src/cli/utils/store-loader';
import { closeConfigurationStore } from '../../../../src/lib/config-store';
import { getDbInstancePath } from '../../../../src/lib/db-instance';
import { createFormPayload } from '../../../helpers/reincarnation-form';

describe('openStore', () => {
  const originalDbPath = process.env.RC_DB_PATH;
  let tmpDir: string;

  beforeEach(() => {
    process.env.RC_DB_PATH = ':memory:';
    tmpDir = mkdtempSync(path.join(os.tmpdir(), 'reincarnation-store-'));
  });

  afterEach(() => {
    closeConfigurationStore();
    rmSync(tmpDir, { recursive: true, force: true });
    if (originalDbPath === undefined) {
      delete process.env.RC_DB_PATH;
    } else {
      process.env.RC_DB_PATH = originalDbPath;
    }
  });

  it('should open RC_DB_PATH when no path is given', () => {
    openStore();

    expect(getDbInstancePath()).toBe(':memory:');
  });

  it('should keep the open store for repeated calls', () => {
    const first = openStore();

    expect(openStore()).toBe(first);
    expect(openStore(':memory:')).toBe(first);
  });

  it('should switch databases when a different path is given', () => {
    const first = path.join(tmpDir, 'first.sqlite');
    const second = path.join(tmpDir, 'second.sqlite');

    openStore(first).applySubmission(createFormPayload({ cronTime: '0 1 * * *' }));
    expect(getDbInstancePath()).toBe(first);

    const other = openStore(second);
    expect(getDbInstancePath()).toBe(second);
    expect(other.getCronTime()).toBeNull();

    expect(openStore(first).getCronTime()).toBe('0 1 * * *');
  });

  it('should treat relative and absolute forms of a path as the same database', () => {
    const file = path.join(tmpDir, 'config.sqlite');
    const store = openStore(file);

    expect(openStore(path.relative(process.cwd(), file))).toBe(store);
  });

  it('should keep the open database when the path is omitted', () => {
    const file = path.join(tmpDir, 'config.sqlite');
    const store = openStore(file);

    expect(openStore()).toBe(store);
    expect(getDbInstancePath()).toBe(file);
  });
});
