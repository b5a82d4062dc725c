import { describe, it, expect } from 'vitest';
import { describeTransform } from '../../../src/cli/commands/inspect.js';
import { compileTransform } from '../../../src/lib/transform/compiler.js';

describe('describeTransform', () => {
  it('should list rules in order with their coercions', () => {
    const spec = compileTransform(
      [
        'fields:',
        '  object_id: "user_id:int"',
        '  data:',
        '    url: "url"',
        '    total: "{ output.data.total = 1 }"',
        'translate: "{ output.source = \'web\' }"',
        'require: node:path',
        '',
      ].join('\n'),
    );

    expect(describeTransform(spec)).toEqual({
      rules: [
        { output: 'object_id', input: 'user_id', coercion: 'int' },
        { output: 'data.url', input: 'url', coercion: 'string' },
        { output: 'data.total', expression: 'output.data.total = 1' },
      ],
      translate: "output.source = 'web'",
      require: ['node:path'],
    });
  });

  it('should report a missing catch-all as null', () => {
    expect(describeTransform(compileTransform('fields: {}\n'))).toEqual({
      rules: [],
      translate: null,
      require: [],
    });
  });
});
