import { LATEX_TAGS } from './NunjucksRenderer';
import { expressionNames, requiredVariables, scanTemplate, type TemplateScan } from './template-variables';

describe('expressionNames', () => {
  it('keeps the root of attribute lookups and filter arguments', () => {
    expect(expressionNames('a.b | f(c)')).toEqual(['a', 'c']);
    expect(expressionNames('volume and volume.index > 1')).toEqual(['volume', 'volume']);
  });

  it('skips keywords, loop helpers and string contents', () => {
    expect(expressionNames('not loop.first and range(n)')).toEqual(['n']);
    expect(expressionNames('"a title" ~ name is none')).toEqual(['name']);
  });
});

describe('scanTemplate', () => {
  it('reads conditions, loop sources and outputs but not loop targets', () => {
    const scan = scanTemplate(
      '((* if draft *))D((* endif *))((* for s in items *))((( s.name )))((* endfor *))((( title | latex )))',
      LATEX_TAGS,
    );

    expect(scan).toEqual({ reads: ['draft', 'items', 'title'], bound: ['s'], includes: [] });
  });

  it('treats set targets as local', () => {
    const scan = scanTemplate('((* set total = items | length *))((( total )))', LATEX_TAGS);

    expect(scan.reads).toEqual(['items']);
    expect(scan.bound).toEqual(['total']);
  });
});

describe('requiredVariables', () => {
  const scans = new Map<string, TemplateScan>([
    ['outer.tex', { reads: ['items'], bound: ['s'], includes: ['inner.tex'] }],
    ['inner.tex', { reads: ['s', 'sep'], bound: [], includes: ['outer.tex'] }],
  ]);

  it('follows includes and drops names the includer binds', () => {
    expect(requiredVariables('outer.tex', scans)).toEqual(['items', 'sep']);
    expect(requiredVariables('inner.tex', scans)).toEqual(['items', 's', 'sep']);
  });

  it('knows nothing of unscanned templates', () => {
    expect(requiredVariables('nope.tex', scans)).toEqual([]);
  });
});
