import { calculateRegionSeverity, type SeverityEvent } from './severity-calculator';

function event(severity: string, confidence = 1, eventType = 'injury'): SeverityEvent {
  return { severity, confidence, eventType };
}

describe('calculateRegionSeverity', () => {
  it('is NA when the region has no events', () => {
    expect(calculateRegionSeverity([])).toBe('NA');
  });

  it('is critical as soon as one event is critical', () => {
    expect(calculateRegionSeverity([event('mild'), event('critical', 0.1)])).toBe('critical');
  });

  it('is severe as soon as one event is severe', () => {
    expect(calculateRegionSeverity([event('normal'), event('severe', 0.9)])).toBe('severe');
  });

  it('needs more than one moderate event to be moderate by count', () => {
    expect(calculateRegionSeverity([event('moderate'), event('moderate')])).toBe('moderate');
    expect(calculateRegionSeverity([event('moderate', 0.95, 'diagnosis')])).toBe('mild');
  });

  it('scales the weight by confidence with a floor of 0.5', () => {
    expect(calculateRegionSeverity([event('mild', 0.9)])).toBe('normal');
    expect(calculateRegionSeverity([event('mild', 1)])).toBe('mild');
    expect(calculateRegionSeverity([event('unknown', 0.2)])).toBe('normal');
  });

  it('weighs surgery above a plain injury', () => {
    expect(calculateRegionSeverity([event('moderate', 1, 'surgery')])).toBe('severe');
    expect(calculateRegionSeverity([event('mild', 1, 'treatment')])).toBe('mild');
  });

  it('is mild when more than three low-weight events accumulate', () => {
    const events = [event('normal'), event('normal'), event('normal'), event('normal')];

    expect(calculateRegionSeverity(events)).toBe('mild');
    expect(calculateRegionSeverity(events.slice(1))).toBe('normal');
  });
});
