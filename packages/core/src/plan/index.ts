export * from './templates';
export * from './timeframe';
export * from './classifier';
export * from './synthesizer';
export * from './milestones';
export * from './prompt';
export * from './generators';
export * from './service';
