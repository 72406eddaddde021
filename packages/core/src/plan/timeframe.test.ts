import { DEFAULT_TOTAL_DAYS, MAX_TOTAL_DAYS, extractTimeframe } from './timeframe';

describe('extractTimeframe', () => {
  it.each([
    ['Launch a mobile app in 3 weeks', 21],
    ['Ship it in 1 week', 7],
    ['Finish the report in 10 days', 10],
    ['Move house in 1 day', 1],
    ['Learn Python programming in 1 month', 30],
    ['Write a thesis in 6 months', 180],
    ['Prepare in 3WEEKS', 21],
    ['Done in 2weeks', 14],
  ])('reads "%s" as %i days', (goal, days) => {
    expect(extractTimeframe(goal)).toBe(days);
  });

  it('defaults to 14 days', () => {
    expect(DEFAULT_TOTAL_DAYS).toBe(14);
    expect(extractTimeframe('Organize the garage')).toBe(14);
  });

  it('uses only the weeks match when several units appear', () => {
    expect(extractTimeframe('2 weeks 3 days')).toBe(14);
  });

  it('prefers weeks over days regardless of position', () => {
    expect(extractTimeframe('5 days of prep then 2 weeks of work')).toBe(14);
  });

  it('prefers days over months regardless of position', () => {
    expect(extractTimeframe('over 2 months, with 4 days off')).toBe(4);
  });

  it('caps very long timeframes', () => {
    expect(MAX_TOTAL_DAYS).toBe(36500);
    expect(extractTimeframe('Renovate the kitchen in 99999999999999999999 days')).toBe(36500);
    expect(extractTimeframe('Renovate the kitchen in 500000 weeks')).toBe(36500);
    expect(extractTimeframe('Renovate the kitchen in 36500 days')).toBe(36500);
    expect(extractTimeframe('Renovate the kitchen in 36501 days')).toBe(36500);
  });

  it('reads ASCII digits only', () => {
    expect(extractTimeframe('Finish in \u0663 weeks')).toBe(DEFAULT_TOTAL_DAYS);
  });
});
