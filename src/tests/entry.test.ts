import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as url from 'node:url';
import { isEntryPoint } from '../entry.js';

const { describe, it, beforeEach, afterEach } = test;

describe('isEntryPoint', () => {
  let tempDir: string;
  let script: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'org-outline-entry-'));
    script = path.join(tempDir, 'main.js');
    fs.writeFileSync(script, '');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should match the script path itself', () => {
    assert.strictEqual(isEntryPoint(url.pathToFileURL(script).href, script), true);
  });

  it('should follow a symlinked bin entry', () => {
    const link = path.join(tempDir, 'org-outline');
    fs.symlinkSync(script, link);

    assert.strictEqual(isEntryPoint(url.pathToFileURL(script).href, link), true);
  });

  it('should reject other scripts and a missing script path', () => {
    const other = path.join(tempDir, 'other.js');
    fs.writeFileSync(other, '');

    assert.strictEqual(isEntryPoint(url.pathToFileURL(script).href, other), false);
    assert.strictEqual(isEntryPoint(url.pathToFileURL(script).href, path.join(tempDir, 'absent.js')), false);
    assert.strictEqual(isEntryPoint(url.pathToFileURL(script).href, undefined), false);
  });
});
