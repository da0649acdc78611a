import { describe, it, expect } from 'vitest';
import { SimilarityCalculator } from '../../src/services/SimilarityCalculator.js';
import { makeSolution } from '../mocks/solutions.js';

describe('SimilarityCalculator', () => {
  const calculator = new SimilarityCalculator();

  const slow = makeSolution({
    category: 'entrance',
    score: 80,
    cssCode: '.a { transform: scale(1); transition: all 1s ease-in; }',
  });
  const quick = makeSolution({
    category: 'entrance',
    score: 60,
    cssCode: '.b { transform: scale(2); transition: all 500ms ease-in; }',
  });
  const unrelated = makeSolution({ category: 'exit', techStack: 'gsap', score: 80 });

  it('should blend category, stack, score, style and duration', () => {
    expect(calculator.similarity(slow, quick)).toBeCloseTo(0.91, 10);
  });

  it('should give partial credit for a different tech stack', () => {
    expect(calculator.similarity(slow, unrelated)).toBeCloseTo(0.325, 10);
  });

  it('should be symmetric', () => {
    expect(calculator.similarity(slow, quick)).toBe(calculator.similarity(quick, slow));
    expect(calculator.similarity(slow, unrelated)).toBe(calculator.similarity(unrelated, slow));
  });

  it('should rate a solution as fully similar to itself', () => {
    expect(calculator.similarity(slow, slow)).toBeCloseTo(1, 10);
  });
});
