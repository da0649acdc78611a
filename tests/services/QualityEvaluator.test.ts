import { describe, it, expect, beforeEach } from 'vitest';
import { QualityEvaluator, NEUTRAL_DIMENSION_SCORE } from '../../src/services/QualityEvaluator.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { createSolution } from '../../src/domain/solution.js';
import { ok, err } from '../../src/types/common.js';
import { DEFAULT_DIMENSION_RULES } from '../../src/domain/heuristics.js';

describe('QualityEvaluator', () => {
  let logProvider: ConsoleLogProvider;
  let evaluator: QualityEvaluator;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    evaluator = new QualityEvaluator(logProvider);
  });

  it('should score markup-only solutions deterministically', () => {
    const solution = createSolution({ htmlCode: '<div id="stage" class="box"></div>' });

    const metrics = evaluator.evaluate(solution);

    expect(metrics.qualityScore).toBeCloseTo(57.5, 10);
    expect(metrics.performanceScore).toBeCloseTo(77.5, 10);
    expect(metrics.creativityScore).toBeCloseTo(51.5, 10);
    expect(metrics.usabilityScore).toBeCloseTo(80, 10);
    expect(metrics.compatibilityScore).toBeCloseTo(80, 10);
    expect(metrics.overallScore).toBeCloseTo(66.925, 10);
    expect(evaluator.determineQualityTier(metrics)).toBe('average');

    expect(evaluator.evaluate(solution)).toEqual(metrics);
  });

  it('should reward richer animation code', () => {
    const plain = evaluator.evaluate(createSolution({ htmlCode: '<div class="a"></div>' }));
    const rich = evaluator.evaluate(
      createSolution({
        htmlCode: '<div class="a" id="a"></div>',
        cssCode:
          '@keyframes pop { from { transform: scale(0.8); } to { transform: scale(1); } } ' +
          '.a { animation: pop 0.4s ease-out; will-change: transform; box-shadow: 0 0 6px; ' +
          'background: linear-gradient(red, blue); opacity: 0.9; }',
      })
    );

    expect(rich.qualityScore).toBeGreaterThan(plain.qualityScore);
    expect(rich.overallScore).toBeGreaterThan(plain.overallScore);
  });

  it('should fall back to the neutral score for a failing dimension and log why', () => {
    const metrics = evaluator.evaluate(
      createSolution({ id: 'broken', cssCode: '.a { transform: none;' })
    );

    expect(metrics.qualityScore).toBe(NEUTRAL_DIMENSION_SCORE);
    expect(metrics.performanceScore).toBeGreaterThan(0);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'warn',
      message: 'Heuristic analysis failed; using neutral score',
      fields: {
        solutionId: 'broken',
        dimension: 'qualityScore',
        heuristic: 'code-structure',
        reason: 'unbalanced braces in style code (1 open, 0 close)',
      },
    });
  });

  it('should apply custom rules and clamp their output', () => {
    const custom = new QualityEvaluator(logProvider, {
      rules: {
        ...DEFAULT_DIMENSION_RULES,
        creativityScore: [
          { name: 'always-high', weight: 0.5, analyze: () => ok(150) },
          { name: 'always-low', weight: 0.5, analyze: () => ok(-20) },
        ],
        usabilityScore: [{ name: 'fails', weight: 1, analyze: () => err('no markup') }],
      },
    });

    const metrics = custom.evaluate(createSolution());

    expect(metrics.creativityScore).toBe(50);
    expect(metrics.usabilityScore).toBe(0);
  });
});
