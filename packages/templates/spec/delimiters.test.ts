import { describe, it } from 'vitest';
import { LexerError } from '../src/index';
import { expectTemplate } from './helpers/expect-template';

describe('set delimiters', () => {
  it('pair behavior', () => {
    expectTemplate('{{=<% %>=}}(<%text%>)').withInput({ text: 'Hey!' }).toCompileTo('(Hey!)');
  });

  it('special characters', () => {
    expectTemplate('({{=[ ]=}}[text])').withInput({ text: 'It worked!' }).toCompileTo('(It worked!)');
  });

  it('tags before the switch are unaffected', () => {
    expectTemplate('{{a}} <%a%> {{=<% %>=}}{{a}} <%a%>')
      .withInput({ a: 'x' })
      .toCompileTo('x <%a%> {{a}} x');
  });

  it('sections', () => {
    expectTemplate(
      '[\n{{#section}}\n  {{data}}\n  |data|\n{{/section}}\n\n{{= | | =}}\n|#section|\n  {{data}}\n  |data|\n|/section|\n]\n',
    )
      .withInput({ section: true, data: 'I got interpolated.' })
      .toCompileTo('[\n  I got interpolated.\n  |data|\n\n  {{data}}\n  I got interpolated.\n]\n');
  });

  it('inverted sections', () => {
    expectTemplate('{{=<% %>=}}<%^missing%>none<%/missing%>').toCompileTo('none');
  });

  it('partials start with default delimiters', () => {
    expectTemplate('[ {{>include}} ]\n{{= | | =}}\n[ |>include| ]\n')
      .withInput({ value: 'yes' })
      .withPartial('include', '.{{value}}.')
      .toCompileTo('[ .yes. ]\n[ .yes. ]\n');
  });

  it('switches inside a partial do not leak out', () => {
    expectTemplate('[ {{>include}} ]\n[ .{{value}}.  .|value|. ]\n')
      .withInput({ value: 'yes' })
      .withPartial('include', '.{{value}}. {{= | | =}} .|value|.')
      .toCompileTo('[ .yes.  .yes. ]\n[ .yes.  .|value|. ]\n');
  });

  it('switching back to the defaults', () => {
    expectTemplate('{{=<% %>=}}<%a%><%={{ }}=%>{{a}}').withInput({ a: 1 }).toCompileTo('11');
  });

  it('comments under custom delimiters', () => {
    expectTemplate('{{=<% %>=}}<%! note %>x').toCompileTo('x');
  });

  it('triple braces are plain text under custom delimiters', () => {
    expectTemplate('{{=<% %>=}}{{{a}}}<%{a}%>').withInput({ a: '&' }).toCompileTo('{{{a}}}&');
  });

  describe('whitespace', () => {
    it('standalone tags remove their lines', () => {
      expectTemplate('Begin.\n{{=@ @=}}\nEnd.').toCompileTo('Begin.\nEnd.');
    });

    it('indented standalone tags remove their lines', () => {
      expectTemplate('Begin.\n  {{=@ @=}}\nEnd.').toCompileTo('Begin.\nEnd.');
    });

    it('inline tags keep the line', () => {
      expectTemplate('  | {{=@ @=}}\n').toCompileTo('  | \n');
    });

    it('pair with padding', () => {
      expectTemplate('|{{= @   @ =}}|').toCompileTo('||');
    });
  });

  describe('errors', () => {
    it('a malformed tag fails to compile', () => {
      expectTemplate('{{=<%=}}').toThrow(
        LexerError,
        "Invalid set delimiters tag: expected two delimiters in '=<%='",
      );
    });

    it('a tag left open under new delimiters fails to compile', () => {
      expectTemplate('{{=<% %>=}}<%name').toThrow(LexerError, "expected closing '%>'");
    });
  });
});
