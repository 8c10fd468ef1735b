import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { compile, compileSource } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { ScriptNode } from '../src/frontend/ast.js';
import type { NodeFactory } from '../src/frontend/factory.js';
import type { Grammar } from '../src/frontend/parse.js';
import { enclosingProbe } from '../src/frontend/query.js';
import { acquireRegister, acquireStack } from '../src/lowering/frame.js';
import type { Pass, PipelineDeps } from '../src/pipeline.js';

const grammarOf = (build: (ast: NodeFactory) => ScriptNode | undefined): Grammar => ({
  parse: (_file, _text, ast) => build(ast),
});

/** `kprobe:a { x = 1 + 2; }` */
const sumScript = (ast: NodeFactory): ScriptNode =>
  ast.script(
    ast.probe(
      'kprobe:a',
      undefined,
      ast.assign(ast.var('x'), ast.binop(ast.int(1), '+', ast.int(2))),
    ),
  );

// Gives every variable an 8-byte stack slot in its probe.
const layoutVars: Pass = {
  name: 'layout',
  pre: (n) => {
    if (n.kind !== 'var' || !n.dyn) return 0;
    const probe = enclosingProbe(n);
    if (!probe) return 0;
    n.dyn.type = 'int';
    n.dyn.size = 8;
    if (n.dyn.loc.kind === 'nowhere') n.dyn.loc = { kind: 'stack', addr: acquireStack(probe, 8) };
    return 0;
  },
};

// Loads every integer literal into its own dynamic register.
const loadInts: Pass = {
  name: 'load-ints',
  post: (n, ctx) => {
    if (n.kind !== 'int') return 0;
    const probe = enclosingProbe(n);
    if (!probe) return 0;
    const reg = acquireRegister(probe, 'dynamic');
    if (reg === undefined) {
      ctx.diagnostics.push({
        id: DiagnosticIds.RegisterExhausted,
        severity: 'error',
        message: 'Expression too complex: no scratch register left.',
        file: ctx.file,
      });
      return 1;
    }
    n.dyn.type = 'int';
    n.dyn.size = 8;
    n.dyn.loc = { kind: 'reg', reg };
    return 0;
  },
};

describe('compileSource', () => {
  it('runs the passes, dumps the annotated tree and frees it', () => {
    const chunks: string[] = [];
    const deps: PipelineDeps = { grammar: grammarOf(sumScript), passes: [layoutVars, loadInts] };

    const res = compileSource(
      'sum.ply',
      '',
      { dumpAst: true, dumpStream: { write: (c: string) => chunks.push(c) } },
      deps,
    );

    expect(res.diagnostics).toEqual([]);
    expect(res.released).toBe(7);
    expect(chunks.join('')).toBe(
      [
        'ast:',
        '`-> <script> (type:script/none size:0x0 loc:nowhere)',
        '    `-> kprobe:a (type:probe/none size:0x0 loc:nowhere)',
        '        `-> = (type:assign/none size:0x0 loc:nowhere)',
        '            |-> x (type:var/int size:0x8 loc:stack/-0x8)',
        '            `-> + (type:binop/none size:0x0 loc:nowhere)',
        '                |-> 0x1 (type:int/int size:0x8 loc:reg/6)',
        '                `-> 0x2 (type:int/int size:0x8 loc:reg/7)',
        '',
      ].join('\n'),
    );
    expect(res.symbols.get('x')).toEqual({
      type: 'int',
      size: 8,
      loc: { kind: 'stack', addr: -8 },
    });
  });

  it('stops at a pass that aborts', () => {
    const ran: string[] = [];
    const tooMany = (ast: NodeFactory): ScriptNode =>
      ast.script(
        ast.probe(
          'kprobe:a',
          undefined,
          ast.assign(
            ast.var('x'),
            ast.binop(
              ast.binop(ast.int(1), '+', ast.int(2)),
              '+',
              ast.binop(ast.int(3), '+', ast.int(4)),
            ),
          ),
        ),
      );
    const after: Pass = {
      name: 'after',
      pre: (n) => {
        ran.push(n.kind);
        return 0;
      },
    };

    const res = compileSource(
      'big.ply',
      '',
      {},
      { grammar: grammarOf(tooMany), passes: [loadInts, after] },
    );

    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.RegisterExhausted,
        severity: 'error',
        message: 'Expression too complex: no scratch register left.',
        file: 'big.ply',
      },
      {
        id: DiagnosticIds.PassAborted,
        severity: 'error',
        message: 'Pass "load-ints" aborted with status 1.',
        file: 'big.ply',
      },
    ]);
    expect(ran).toEqual([]);
    expect(res.released).toBe(11);
  });

  it('reports unknown providers and skips the passes', () => {
    const ran: string[] = [];
    const res = compileSource(
      'p.ply',
      '',
      { providers: [{ name: 'tracepoint' }] },
      {
        grammar: grammarOf(sumScript),
        passes: [
          {
            name: 'spy',
            pre: (n) => {
              ran.push(n.kind);
              return 0;
            },
          },
        ],
      },
    );

    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.UnknownProvider]);
    expect(ran).toEqual([]);
    expect(res.released).toBe(7);
  });

  it('turns a grammar that produces nothing into a parse error', () => {
    const res = compileSource(
      'bad.ply',
      'kprobe:',
      {},
      { grammar: grammarOf(() => undefined), passes: [] },
    );
    expect(res).toEqual({
      diagnostics: [
        {
          id: DiagnosticIds.ParseError,
          severity: 'error',
          message: 'Failed to parse script.',
          file: 'bad.ply',
        },
      ],
      symbols: expect.anything(),
      released: 0,
    });
  });

  it('keeps the diagnostics a failing grammar reports itself', () => {
    const grammar: Grammar = {
      parse: (file, _text, _ast, diagnostics) => {
        diagnostics.push({
          id: DiagnosticIds.ParseError,
          severity: 'error',
          message: 'syntax error, unexpected "}"',
          file,
        });
        return undefined;
      },
    };
    const res = compileSource('bad.ply', '}', {}, { grammar, passes: [] });
    expect(res.diagnostics.map((d) => d.message)).toEqual(['syntax error, unexpected "}"']);
  });

  it('reports a grammar that throws as an internal parse error', () => {
    const grammar: Grammar = {
      parse: () => {
        throw new Error('boom');
      },
    };
    const res = compileSource('crash.ply', '', {}, { grammar, passes: [] });
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.InternalParseError,
        severity: 'error',
        message: 'Internal error during parse: Error: boom',
        file: 'crash.ply',
      },
    ]);
  });
});

describe('compile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads the script file and hands its text to the grammar', async () => {
    dir = await mkdtemp(join(tmpdir(), 'probec-'));
    const file = join(dir, 'trace.ply');
    await writeFile(file, 'kprobe:a { x = 1 + 2; }\n', 'utf8');

    const seen: string[] = [];
    const res = await compile(
      file,
      {},
      {
        grammar: {
          parse: (_file, text, ast) => {
            seen.push(text);
            return sumScript(ast);
          },
        },
        passes: [],
      },
    );

    expect(seen).toEqual(['kprobe:a { x = 1 + 2; }\n']);
    expect(res.diagnostics).toEqual([]);
    expect(res.released).toBe(7);
  });

  it('reports a missing file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'probec-'));
    const missing = join(dir, 'missing.ply');
    const res = await compile(missing, {}, { grammar: grammarOf(sumScript), passes: [] });

    expect(res.released).toBe(0);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe(DiagnosticIds.IoReadFailed);
    expect(res.diagnostics[0]?.file).toBe(missing);
    expect(res.diagnostics[0]?.message).toContain('Failed to read script:');
  });
});
