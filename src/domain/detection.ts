/**
 * Tech stack and category detection for solutions imported from plain
 * HTML documents or CodePen payloads, which carry neither.
 */

import type { SolutionCategory, TechStack } from '../types/models.js';

/** Checked in order; the first list with a hit decides the category. */
const CATEGORY_KEYWORDS: ReadonlyArray<readonly [SolutionCategory, readonly string[]]> = [
  ['entrance', ['fade', 'slide', 'enter', 'appear']],
  ['exit', ['exit', 'leave', 'disappear', 'hide']],
  ['transition', ['transition', 'change', 'switch']],
  ['interaction', ['hover', 'click', 'interact', 'button']],
  ['effect', ['particle', 'effect', 'glow', 'shadow']],
];

const SCRIPT_BLOCK = /<script[^>]*>([\s\S]*?)<\/script>/gi;

export function detectTechStack(cssCode: string, jsCode: string): TechStack {
  if (jsCode) {
    if (jsCode.toLowerCase().includes('gsap') || jsCode.includes('TweenMax')) return 'gsap';
    if (jsCode.includes('THREE') || jsCode.toLowerCase().includes('three.js')) return 'three_js';
    return 'javascript';
  }

  if (cssCode.toLowerCase().includes('svg')) return 'svg_animation';
  return 'css_animation';
}

export function detectCategory(htmlCode: string, cssCode: string): SolutionCategory {
  const content = `${htmlCode}${cssCode}`.toLowerCase();

  const match = CATEGORY_KEYWORDS.find(([, keywords]) =>
    keywords.some((keyword) => content.includes(keyword))
  );
  return match ? match[0] : 'composite';
}

export interface ParsedHtmlDocument {
  name: string;
  htmlCode: string;
  cssCode: string;
  jsCode: string;
  techStack: TechStack;
  category: SolutionCategory;
}

/**
 * Split a standalone HTML document into its markup, style and script parts.
 * Without a `<body>` the whole input is treated as markup.
 */
export function parseHtmlDocument(html: string, fallbackName: string): ParsedHtmlDocument {
  const title = /<title>([^<]+)<\/title>/i.exec(html)?.[1]?.trim();
  const cssCode = collectBlocks(html, /<style[^>]*>([\s\S]*?)<\/style>/gi);
  const jsCode = collectBlocks(html, SCRIPT_BLOCK);
  const body = /<body[^>]*>([\s\S]*?)<\/body>/i.exec(html)?.[1];
  // Scripts are carried separately in jsCode
  const htmlCode = body !== undefined ? body.replace(SCRIPT_BLOCK, '').trim() : html;

  return {
    name: title || fallbackName,
    htmlCode,
    cssCode,
    jsCode,
    techStack: detectTechStack(cssCode, jsCode),
    category: detectCategory(htmlCode, cssCode),
  };
}

function collectBlocks(html: string, pattern: RegExp): string {
  return Array.from(html.matchAll(pattern), (match) => match[1] ?? '')
    .join('\n')
    .trim();
}
