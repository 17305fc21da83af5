import { describe, it, expect } from 'vitest';
import { createItem, withScore } from '../types.js';

describe('createItem', () => {
  it('сохраняет метку и данные', () => {
    const item = createItem('Frodo', { race: 'hobbit' });

    expect(item.label).toBe('Frodo');
    expect(item.payload).toEqual({ race: 'hobbit' });
  });

  it('допускает пустую метку', () => {
    const item = createItem('', 42);

    expect(item.label).toBe('');
    expect(item.payload).toBe(42);
  });

  it('возвращает неизменяемый объект', () => {
    const item = createItem('Sam', 1);

    expect(Object.isFrozen(item)).toBe(true);
  });
});

describe('withScore', () => {
  it('создаёт оценённую копию элемента', () => {
    const item = createItem('Gandalf', 'wizard');
    const match = withScore(item, 120, [0, 3]);

    expect(match.item).toEqual(item);
    expect(match.item).not.toBe(item);
    expect(match.score).toBe(120);
    expect(match.positions).toEqual([0, 3]);
  });

  it('копирует массив позиций', () => {
    const positions = [1, 2];
    const match = withScore(createItem('Bilbo', null), 5, positions);

    positions.push(4);

    expect(match.positions).toEqual([1, 2]);
  });

  it('не проверяет позиции, переданные scorer-ом', () => {
    const match = withScore(createItem('ab', null), 1, [7, 3]);

    expect(match.positions).toEqual([7, 3]);
  });
});
