import { describe, it, expect, beforeEach } from 'vitest';
import { createContainer, type Container } from '../../src/container.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { MockSolutionRepository } from '../mocks/MockSolutionRepository.js';
import { makeSolution } from '../mocks/solutions.js';

describe('InteractionService', () => {
  let container: Container;

  beforeEach(async () => {
    container = createContainer({
      solutionRepo: new MockSolutionRepository(),
      logProvider: new ConsoleLogProvider(),
    });
    await container.solutionService.add(makeSolution({ id: 'orb', category: 'effect', techStack: 'gsap' }), false);
  });

  it('should track views without touching counters', async () => {
    await container.interactionService.record({ solutionId: 'orb', action: 'view' });

    expect(container.tracker.getInteractions('orb')).toEqual(['view']);
    expect(container.solutionService.get('orb')?.usageCount).toBe(0);
  });

  it('should count applies as usage', async () => {
    await container.interactionService.record({ solutionId: 'orb', action: 'apply' });

    expect(container.solutionService.get('orb')?.usageCount).toBe(1);
    expect(container.tracker.getEvents()[0]).toMatchObject({
      action: 'apply',
      category: 'effect',
      techStack: 'gsap',
    });
  });

  it('should add favorites', async () => {
    await container.interactionService.record({ solutionId: 'orb', action: 'favorite' });

    expect(container.solutionService.isFavorite('orb')).toBe(true);
    expect(container.tracker.getInteractions('orb')).toEqual(['favorite']);
  });

  it('should not track a repeated favorite', async () => {
    await container.interactionService.record({ solutionId: 'orb', action: 'favorite' });
    await container.interactionService.record({ solutionId: 'orb', action: 'favorite' });

    expect(container.tracker.getInteractions('orb')).toEqual(['favorite']);
    expect(container.tracker.categoryCounters().effect).toBe(2);
    expect(container.solutionService.get('orb')?.favoriteCount).toBe(1);
  });

  it('should apply and track ratings', async () => {
    await container.interactionService.record({ solutionId: 'orb', action: 'rate', rating: 4 });

    expect(container.solutionService.get('orb')?.userRating).toBe(4);
    expect(container.tracker.getEvents()[0]?.rating).toBe(4);
  });

  it('should require a rating for rate interactions', async () => {
    await expect(
      container.interactionService.record({ solutionId: 'orb', action: 'rate' })
    ).rejects.toThrow(ValidationError);
    expect(container.tracker.eventCount).toBe(0);
  });

  it('should reject out-of-range ratings before tracking them', async () => {
    await expect(
      container.interactionService.record({ solutionId: 'orb', action: 'rate', rating: 9 })
    ).rejects.toThrow(ValidationError);
    expect(container.tracker.eventCount).toBe(0);
    expect(container.solutionService.get('orb')?.ratingCount).toBe(0);
  });

  it('should throw NotFoundError for unknown solutions', async () => {
    await expect(
      container.interactionService.record({ solutionId: 'missing', action: 'view' })
    ).rejects.toThrow(NotFoundError);
  });

  it('should drop cached recommendations', async () => {
    container.recommendationEngine.recommend(container.solutionService.list());
    expect(container.recommendationEngine.getStatistics().cacheSize).toBe(1);

    await container.interactionService.record({ solutionId: 'orb', action: 'view' });

    expect(container.recommendationEngine.getStatistics().cacheSize).toBe(0);
  });
});
