import type { RunScript, ScriptSession } from '../schema/index.js';

// Sessions cycle through these in order.
const TEMPLATES: readonly ScriptSession[] = [
  {
    url: 'https://example.com',
    steps: [
      { action: 'scroll', amount: 200, name: 'example_scroll', description: 'Scroll the example page' },
      { action: 'click', selector: 'a', timeout: 5, name: 'example_more', description: 'Follow the first link' },
    ],
  },
  {
    url: 'https://example.org',
    steps: [
      { action: 'navigate', url: 'https://example.net', name: 'net_navigate', description: 'Navigate to example.net' },
      { action: 'click', selector: 'h1', by: 'css', timeout: 5, name: 'net_heading', description: 'Click the heading' },
    ],
  },
  {
    url: 'https://example.net',
    steps: [
      { action: 'wait', seconds: 1, name: 'net_wait', description: 'Let the page settle' },
      { action: 'click', selector: 'More information...', by: 'text', timeout: 5, name: 'net_link', description: 'Click the information link' },
      { action: 'scroll', amount: 500, name: 'net_scroll', description: 'Scroll down the page' },
    ],
  },
];

/** The built-in demo: `count` sessions running the templates in turn. */
export function exampleScript(count: number): RunScript {
  return {
    sessions: Array.from({ length: count }, (_, i) => {
      const template = TEMPLATES[i % TEMPLATES.length];
      return template ?? { steps: [] };
    }),
  };
}
