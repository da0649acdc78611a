import { describe, it, expect } from 'vitest';
import { detectCategory, detectTechStack, parseHtmlDocument } from '../../src/domain/detection.js';

describe('detection', () => {
  describe('detectTechStack', () => {
    it('should recognise animation libraries in script code', () => {
      expect(detectTechStack('', 'gsap.to(".box", { x: 100 });')).toBe('gsap');
      expect(detectTechStack('', 'TweenMax.to(box, 1, {});')).toBe('gsap');
      expect(detectTechStack('', 'const scene = new THREE.Scene();')).toBe('three_js');
    });

    it('should fall back to plain javascript for other scripts', () => {
      expect(detectTechStack('', 'el.animate([], 300);')).toBe('javascript');
    });

    it('should classify script-free code by its style', () => {
      expect(detectTechStack('svg path { stroke-dasharray: 10; }', '')).toBe('svg_animation');
      expect(detectTechStack('.a { opacity: 0; }', '')).toBe('css_animation');
    });
  });

  describe('detectCategory', () => {
    it('should pick the first category with a keyword hit', () => {
      expect(detectCategory('<div class="fade-in"></div>', '')).toBe('entrance');
      expect(detectCategory('<div class="toast"></div>', '.toast.leave { opacity: 0; }')).toBe('exit');
      expect(detectCategory('<button>Go</button>', '')).toBe('interaction');
      expect(detectCategory('<div></div>', '.a { filter: drop-shadow(0 0 2px); }')).toBe('effect');
    });

    it('should default to composite', () => {
      expect(detectCategory('<div></div>', '.a { color: red; }')).toBe('composite');
    });
  });

  describe('parseHtmlDocument', () => {
    it('should split a standalone document into its parts', () => {
      const html = [
        '<!DOCTYPE html><html><head>',
        '<title> Glow Card </title>',
        '<style>.card { box-shadow: 0 0 8px gold; }</style>',
        '</head><body>',
        '<div class="card"></div>',
        "<script>document.querySelector('.card');</script>",
        '</body></html>',
      ].join('');

      expect(parseHtmlDocument(html, 'fallback')).toEqual({
        name: 'Glow Card',
        htmlCode: '<div class="card"></div>',
        cssCode: '.card { box-shadow: 0 0 8px gold; }',
        jsCode: "document.querySelector('.card');",
        techStack: 'javascript',
        category: 'effect',
      });
    });

    it('should treat a fragment without body as markup and use the fallback name', () => {
      const parsed = parseHtmlDocument('<div class="dot"></div>', 'dot.html');

      expect(parsed.name).toBe('dot.html');
      expect(parsed.htmlCode).toBe('<div class="dot"></div>');
      expect(parsed.cssCode).toBe('');
      expect(parsed.techStack).toBe('css_animation');
    });
  });
});
