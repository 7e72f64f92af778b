import { describe, it, expect } from 'vitest';
import { parseDuration } from '@ibhist/contracts';
import { buildRequestEnvelope, resolveRequestWindow } from '../src/index.js';

describe('buildRequestEnvelope', () => {
  it('should request regular hours only for regular sessions', () => {
    const resolved = resolveRequestWindow({
      startDate: '2024-01-15',
      endDate: '2024-01-31',
      defaultDuration: parseDuration('1 Y'),
      sessionMode: 'regular',
    });

    expect(buildRequestEnvelope(resolved, '1 hour', 'regular', 'TRADES')).toEqual({
      endDateTime: '20240131 16:00:00',
      durationStr: '17 D',
      barSizeSetting: '1 hour',
      whatToShow: 'TRADES',
      useRTH: true,
      formatDate: 2,
    });
  });

  it('should include extended hours otherwise', () => {
    const resolved = resolveRequestWindow({
      endDate: '2024-01-31',
      defaultDuration: parseDuration('30 D'),
      sessionMode: 'extended',
    });
    const envelope = buildRequestEnvelope(resolved, '5 mins', 'extended', 'MIDPOINT');

    expect(envelope.useRTH).toBe(false);
    expect(envelope.endDateTime).toBe('20240201 02:00:00');
    expect(envelope.durationStr).toBe('30 D');
    expect(envelope.whatToShow).toBe('MIDPOINT');
  });
});
