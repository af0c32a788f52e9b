export * from './name-normalizer.util';
export * from './similarity-score.util';
