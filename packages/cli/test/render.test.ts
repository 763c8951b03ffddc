import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { runRender } from '../src/commands/render.js';
import { captureIO, createWorkspace, removeWorkspace } from './helpers.js';

describe('mustard render', () => {
  let root = '';

  afterEach(() => {
    removeWorkspace(root);
  });

  it('renders with YAML data and nested partials', async () => {
    root = createWorkspace({
      'page.mustache': '<h1>{{title}}</h1>\n{{>parts/footer}}\n',
      'data.yaml': 'title: Home\nyear: 2024\n',
      'partials/parts/footer.mustache': '<p>{{year}}</p>\n',
    });
    const io = captureIO();

    const code = await runRender(
      'page.mustache',
      { data: 'data.yaml', partials: 'partials', color: false },
      io,
      root,
      {},
    );

    expect(code).toBe(0);
    expect(io.out()).toBe('<h1>Home</h1>\n<p>2024</p>\n');
    expect(io.err()).toBe('');
  });

  it('escapes values from JSON data', async () => {
    root = createWorkspace({
      'page.mustache': '{{name}} / {{{name}}}',
      'data.json': '{"name": "<b>Tom & Jerry</b>"}',
    });
    const io = captureIO();

    const code = await runRender('page.mustache', { data: 'data.json' }, io, root, {});

    expect(code).toBe(0);
    expect(io.out()).toBe('&lt;b&gt;Tom &amp; Jerry&lt;/b&gt; / <b>Tom & Jerry</b>');
  });

  it('renders against an empty context without --data', async () => {
    root = createWorkspace({ 'page.mustache': '[{{missing}}]{{^missing}}none{{/missing}}' });
    const io = captureIO();

    await runRender('page.mustache', {}, io, root, {});

    expect(io.out()).toBe('[]none');
  });

  it('takes the partials directory from configuration', async () => {
    root = createWorkspace({
      '.env': 'MUSTARD_PARTIALS_DIR=shared\nMUSTARD_PARTIAL_EXT=.tpl\n',
      'page.mustache': 'before {{>greeting}} after',
      'shared/greeting.tpl': 'hello',
      'shared/ignored.mustache': 'nope',
    });
    const io = captureIO();

    await runRender('page.mustache', {}, io, root, {});

    expect(io.out()).toBe('before hello after');
  });

  it('writes to --out instead of stdout', async () => {
    root = createWorkspace({ 'page.mustache': 'x={{x}}', 'data.json': '{"x": 1.5}' });
    const io = captureIO();

    const code = await runRender(
      'page.mustache',
      { data: 'data.json', out: 'out/page.txt' },
      io,
      root,
      {},
    );

    // The output directory does not exist, so the write fails as an IO error
    expect(code).toBe(2);

    fs.mkdirSync(path.join(root, 'out'));
    const retry = captureIO();
    expect(
      await runRender('page.mustache', { data: 'data.json', out: 'out/page.txt' }, retry, root, {}),
    ).toBe(0);
    expect(retry.out()).toBe('');
    expect(fs.readFileSync(path.join(root, 'out/page.txt'), 'utf-8')).toBe('x=1.5');
  });

  it('reports template errors with position and exit code 1', async () => {
    root = createWorkspace({ 'page.mustache': 'line one\n  {{#items}}\n' });
    const io = captureIO();

    const code = await runRender('page.mustache', { color: false }, io, root, {});

    expect(code).toBe(1);
    expect(io.out()).toBe('');
    expect(io.err()).toBe(
      '✗ page.mustache:2:3 ParserError: Unclosed section: items opened at line 2 was never closed\n',
    );
  });

  it('reports a missing template with exit code 2', async () => {
    root = createWorkspace({});
    const io = captureIO();

    const code = await runRender('missing.mustache', { color: false }, io, root, {});

    expect(code).toBe(2);
    expect(io.err()).toBe(`Error: Cannot read file: ${path.join(root, 'missing.mustache')}\n`);
  });

  it('rejects unsupported data files', async () => {
    root = createWorkspace({ 'page.mustache': '', 'data.txt': 'x' });
    const io = captureIO();

    const code = await runRender('page.mustache', { data: 'data.txt', color: false }, io, root, {});

    expect(code).toBe(2);
    expect(io.err()).toBe(
      `Error: Unsupported data file '${path.join(root, 'data.txt')}': expected .json, .yaml or .yml\n`,
    );
  });

  it('reports invalid JSON as a usage error', async () => {
    root = createWorkspace({ 'page.mustache': '', 'data.json': '{oops' });
    const io = captureIO();

    const code = await runRender('page.mustache', { data: 'data.json', color: false }, io, root, {});

    expect(code).toBe(2);
    expect(io.err()).toContain(`Error: Invalid JSON in ${path.join(root, 'data.json')}:`);
  });

  it('logs engine events to stderr in the test environment', async () => {
    root = createWorkspace({ 'page.mustache': 'a{{>nothing}}b' });
    const io = captureIO();

    await runRender('page.mustache', {}, io, root, { MUSTARD_ENV: 'test' });

    expect(io.out()).toBe('ab');
    const entry: unknown = JSON.parse(io.err());
    expect(entry).toMatchObject({
      level: 'debug',
      event_type: 'partial_missing',
      metadata: { template: 'page.mustache', partial: 'nothing' },
    });
  });

  it('stays quiet in production', async () => {
    root = createWorkspace({ 'page.mustache': 'a{{>nothing}}b' });
    const io = captureIO();

    await runRender('page.mustache', {}, io, root, {});

    expect(io.err()).toBe('');
  });
});
