import { describe, it, expect } from 'vitest';
import { calculateOverallProgress, createProgressEvent, PipelineEventType } from '../progress.js';

describe('createProgressEvent', () => {
  it('rounds and clamps the percentage', () => {
    expect(createProgressEvent('op', PipelineEventType.PHASE_START, 33.6, 'x').progress_percentage).toBe(34);
    expect(createProgressEvent('op', PipelineEventType.PHASE_START, 120, 'x').progress_percentage).toBe(100);
    expect(createProgressEvent('op', PipelineEventType.PHASE_START, -3, 'x').progress_percentage).toBe(0);
  });

  it('merges extra fields', () => {
    const event = createProgressEvent('op-1', PipelineEventType.ISSUES_FOUND, 50, '2 issue(s) found', {
      iteration: 1,
      issues: ['a', 'b'],
    });
    expect(event).toMatchObject({
      type: 'issues_found',
      operationId: 'op-1',
      current_step: '2 issue(s) found',
      iteration: 1,
      issues: ['a', 'b'],
    });
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });
});

describe('calculateOverallProgress', () => {
  it('reserves the edges of the bar for loading and reporting', () => {
    expect(calculateOverallProgress('load', 0)).toBe(0);
    expect(calculateOverallProgress('load', 100)).toBe(5);
    expect(calculateOverallProgress('report', 0)).toBe(95);
    expect(calculateOverallProgress('report', 100)).toBe(100);
  });

  it('spans a single iteration over the middle band', () => {
    expect(calculateOverallProgress('architect', 0)).toBe(5);
    expect(calculateOverallProgress('interpret', 100)).toBe(95);
  });

  it('shares the band between iterations', () => {
    expect(calculateOverallProgress('validate', 0, 1, 3)).toBe(17);
    expect(calculateOverallProgress('erc', 50, 2, 3)).toBe(59);
    expect(calculateOverallProgress('interpret', 100, 3, 3)).toBe(95);
  });
});
