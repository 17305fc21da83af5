import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { createChalk } from '../colors.js';

describe('createChalk', () => {
  it('never отключает цвета', () => {
    expect(createChalk('never').level).toBe(0);
  });

  it('always включает хотя бы базовые цвета', () => {
    expect(createChalk('always').level).toBeGreaterThanOrEqual(1);
  });

  it('auto использует автоопределение chalk', () => {
    expect(createChalk('auto')).toBe(chalk);
  });
});
