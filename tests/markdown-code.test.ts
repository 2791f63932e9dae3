import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { LF } from '../src/config/formatting.js';
import {
  codeFence,
  codeSpan,
  fencedCodeBlock,
  fencedJsCodeBlock,
  fencedRsCodeBlock,
  fencedShCodeBlock,
  fencedTsCodeBlock,
} from '../src/markdown/code.js';

describe('codeFence', () => {
  it('returns three backticks without an info string', () => {
    assert.equal(codeFence(), '```');
  });

  it('appends the info string directly after the backticks', () => {
    assert.equal(codeFence('rust'), '```rust');
  });

  it('renders an empty info string like an absent one', () => {
    assert.equal(codeFence(''), codeFence(undefined));
  });
});

describe('codeSpan', () => {
  it('wraps code in single backticks', () => {
    assert.equal(codeSpan('println!("Hello world!");'), '`println!("Hello world!");`');
  });

  it('leaves embedded backticks untouched', () => {
    assert.equal(codeSpan('a`b'), '`a`b`');
  });

  it('wraps empty code', () => {
    assert.equal(codeSpan(''), '``');
  });
});

describe('fencedCodeBlock', () => {
  it('builds a block with an info string', () => {
    assert.equal(fencedCodeBlock('x = 1', 'python'), '```python\nx = 1\n```');
  });

  it('builds a block without an info string', () => {
    assert.equal(fencedCodeBlock('echo hi'), '```\necho hi\n```');
  });

  it('keeps multi-line code verbatim between the fences', () => {
    const code = 'const a = 1;\n\nconst b = 2;';
    const lines = fencedCodeBlock(code, 'ts').split(LF);

    assert.equal(lines.length, 5);
    assert.equal(lines[0], '```ts');
    assert.equal(lines[lines.length - 1], '```');
    assert.equal(lines.slice(1, -1).join(LF), code);
  });

  it('uses line feeds even when the code contains carriage returns', () => {
    assert.equal(fencedCodeBlock('a\r\nb'), '```\na\r\nb\n```');
  });

  it('does not lengthen the fence for code containing a fence', () => {
    assert.equal(fencedCodeBlock('```'), '```\n```\n```');
  });

  it('returns the same output for the same input', () => {
    assert.equal(fencedCodeBlock('x', 'js'), fencedCodeBlock('x', 'js'));
  });
});

describe('language-tagged fenced code blocks', () => {
  const code = "console.log('Hello world!');";

  it('tags JavaScript blocks', () => {
    assert.equal(fencedJsCodeBlock(code), fencedCodeBlock(code, 'javascript'));
    assert.equal(
      fencedJsCodeBlock(code),
      "```javascript\nconsole.log('Hello world!');\n```"
    );
  });

  it('tags Rust blocks', () => {
    assert.equal(fencedRsCodeBlock('let x = 1;'), '```rust\nlet x = 1;\n```');
  });

  it('tags shell blocks', () => {
    assert.equal(
      fencedShCodeBlock('echo "Hello world!"'),
      '```shell\necho "Hello world!"\n```'
    );
  });

  it('tags TypeScript blocks', () => {
    assert.equal(fencedTsCodeBlock(code), fencedCodeBlock(code, 'typescript'));
  });
});
