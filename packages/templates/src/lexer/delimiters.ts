/**
 * Tag delimiter pair used while scanning a template.
 *
 * Only a set-delimiters tag (`{{=<% %>=}}`) changes the pair, and only for the
 * text that follows it in the same lexing pass.
 */
export interface Delimiters {
  readonly open: string;
  readonly close: string;
}

export const DEFAULT_DELIMITERS: Delimiters = Object.freeze({ open: '{{', close: '}}' });

/**
 * Check whether the open marker is the default `{{`, which is all that
 * `{{{name}}}` needs
 */
export function isDefaultOpen(delimiters: Delimiters): boolean {
  return delimiters.open === DEFAULT_DELIMITERS.open;
}
