// Интерфейсы модуля сопоставления.

// Результат сопоставления метки с запросом.
export interface ScoreResult {
  // Целое число, больше — лучше.
  score: number;
  // Строго возрастающие индексы символов метки.
  positions: number[];
}

// Абстракция scorer-а: чистая синхронная функция без состояния.
// undefined означает, что метка не подходит под запрос.
export interface Scorer {
  score(label: string, query: string): ScoreResult | undefined;
}
