import { createMockLogger } from '@mustard/logger/mock';
import { describe, expect, it } from 'vitest';
import { RenderError } from '../src/index';
import { expectTemplate } from './helpers/expect-template';

describe('partials', () => {
  it('basic behavior', () => {
    expectTemplate('"{{>text}}"').withPartial('text', 'from partial').toCompileTo('"from partial"');
  });

  it('failed lookup renders nothing', () => {
    expectTemplate('"{{>text}}"').toCompileTo('""');
  });

  it('inherits the current context', () => {
    expectTemplate('"{{>partial}}"')
      .withInput({ text: 'content' })
      .withPartial('partial', '*{{text}}*')
      .toCompileTo('"*content*"');
  });

  it('renders once per list item', () => {
    expectTemplate('{{#people}}{{>person}}{{/people}}')
      .withInput({ people: [{ name: 'Ann' }, { name: 'Ben' }] })
      .withPartial('person', '<li>{{name}}</li>')
      .toCompileTo('<li>Ann</li><li>Ben</li>');
  });

  it('recursion', () => {
    expectTemplate('{{>node}}')
      .withInput({ content: 'X', nodes: [{ content: 'Y', nodes: [] }] })
      .withPartial('node', '{{content}}<{{#nodes}}{{>node}}{{/nodes}}>')
      .toCompileTo('X<Y<>>');
  });

  it('nested partial names with slashes', () => {
    expectTemplate('{{>layout/header}}')
      .withPartials({ 'layout/header': '[{{>layout/title}}]', 'layout/title': 'T' })
      .toCompileTo('[T]');
  });

  it('runaway recursion raises a render error', () => {
    expectTemplate('{{>loop}}')
      .withPartial('loop', 'x{{>loop}}')
      .withMaxPartialDepth(5)
      .toThrow(RenderError, "Maximum partial depth of 5 exceeded while expanding 'loop'");
  });

  it('logs missing partials', () => {
    const logger = createMockLogger();

    expectTemplate('[{{>absent}}]').withLogger(logger).toCompileTo('[]');

    expect(logger.debug).toHaveBeenCalledWith('partial_missing', { partial: 'absent' });
  });

  it('an empty partial renders nothing', () => {
    expectTemplate('[{{>blank}}]').withPartial('blank', '').toCompileTo('[]');
  });

  describe('whitespace', () => {
    it('surrounding whitespace is kept', () => {
      expectTemplate('| {{>partial}} |').withPartial('partial', '\t|\t').toCompileTo('| \t|\t |');
    });

    it('inline partials are not indented', () => {
      expectTemplate('  {{data}}  {{> partial}}\n')
        .withInput({ data: '|' })
        .withPartial('partial', '>\n>')
        .toCompileTo('  |  >\n>\n');
    });

    it('standalone line endings', () => {
      expectTemplate('|\r\n{{>partial}}\r\n|').withPartial('partial', '>').toCompileTo('|\r\n>|');
    });

    it('standalone without a previous line', () => {
      expectTemplate('  {{>partial}}\n>').withPartial('partial', '>\n>').toCompileTo('  >\n  >>');
    });

    it('standalone without a newline', () => {
      expectTemplate('>\n  {{>partial}}').withPartial('partial', '>\n>').toCompileTo('>\n  >\n  >');
    });

    it('standalone indentation applies to every line', () => {
      expectTemplate('\\\n {{>partial}}\n/\n')
        .withInput({ content: '<\n->' })
        .withPartial('partial', '|\n{{{content}}}\n|\n')
        .toCompileTo('\\\n |\n <\n->\n |\n/\n');
    });

    it('indent reaches a two-line partial exactly', () => {
      expectTemplate('  {{> p}}').withPartial('p', 'one\ntwo').toCompileTo('  one\n  two');
    });

    it('padding inside the tag', () => {
      expectTemplate('|{{> partial }}|')
        .withInput({ boolean: true })
        .withPartial('partial', '[]')
        .toCompileTo('|[]|');
    });
  });
});
