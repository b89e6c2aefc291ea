import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadCookie } from '../credentials.js';

describe('loadCookie', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bilirank-cookie-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads and trims the cookie file', () => {
    const file = path.join(tmpDir, 'cookie.token');
    fs.writeFileSync(file, '  SESSDATA=test-session; bili_jct=test-csrf\n');
    expect(loadCookie(file)).toBe('SESSDATA=test-session; bili_jct=test-csrf');
  });

  it('returns undefined when the file is missing', () => {
    expect(loadCookie(path.join(tmpDir, 'absent.token'))).toBeUndefined();
  });

  it('returns undefined for an empty file', () => {
    const file = path.join(tmpDir, 'cookie.token');
    fs.writeFileSync(file, '\n');
    expect(loadCookie(file)).toBeUndefined();
  });

  it('does not throw when the path cannot be read', () => {
    // a directory exists but cannot be read as a file
    expect(loadCookie(tmpDir)).toBeUndefined();
  });
});
