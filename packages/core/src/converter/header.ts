import type { HeaderStatus } from './types';

export const DEFAULT_SCRIPT_TAG =
  '<script id="MathJax-script" async src="https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-chtml.js"></script>';

const HEAD_OPEN_TAG = /<head(?:\s[^>]*)?>/i;

export interface HeaderInjection {
  html: string;
  status: HeaderStatus;
}

/**
 * Insert the script line on its own line right after the opening <head> tag.
 * A document that already contains the line is left alone, so reruns never stack copies.
 */
export function injectHeader(html: string, scriptTag: string = DEFAULT_SCRIPT_TAG): HeaderInjection {
  const match = HEAD_OPEN_TAG.exec(html);
  if (!match) {
    return { html, status: 'missing' };
  }
  if (html.includes(scriptTag)) {
    return { html, status: 'present' };
  }

  const insertAt = match.index + match[0].length;
  return {
    html: `${html.slice(0, insertAt)}\n${scriptTag}${html.slice(insertAt)}`,
    status: 'injected',
  };
}
