import { describe, expect, it } from 'vitest';
import { pauseSpinnerWhile } from '../src/reporter.js';
import type { PausableSpinner } from '../src/reporter.js';
import { createRecordingReporter } from './helpers.js';

function createSpinner(events: string[], isSpinning: boolean): PausableSpinner {
  return {
    isSpinning,
    clear: () => events.push('clear'),
    render: () => events.push('render')
  };
}

describe('pauseSpinnerWhile', () => {
  it('clears the running spinner around each line', () => {
    const events: string[] = [];
    const inner = createRecordingReporter();
    const spinner = createSpinner(events, true);
    const reporter = pauseSpinnerWhile(
      {
        ...inner,
        info: message => {
          events.push(`info:${message}`);
          inner.info(message);
        }
      },
      () => spinner
    );

    reporter.info('  Found 2 assets in: 2024/trip');

    expect(events).toEqual(['clear', 'info:  Found 2 assets in: 2024/trip', 'render']);
    expect(inner.messages.info).toEqual(['  Found 2 assets in: 2024/trip']);
  });

  it('writes straight through without an active spinner', () => {
    const events: string[] = [];
    const inner = createRecordingReporter();
    const stopped = createSpinner(events, false);

    pauseSpinnerWhile(inner, () => undefined).error('Failed to get albums: timeout');
    pauseSpinnerWhile(inner, () => stopped).warn('No assets found at this path');

    expect(events).toEqual([]);
    expect(inner.messages.error).toEqual(['Failed to get albums: timeout']);
    expect(inner.messages.warn).toEqual(['No assets found at this path']);
  });
});
