import type { KeyEvent } from '../session/types.js';

const ESC = '\x1b';

// Одиночные управляющие символы.
const CONTROL_KEYS: Record<string, KeyEvent> = {
  '\r': { type: 'confirm' },
  '\n': { type: 'confirm' },
  '\x7f': { type: 'backspace' },
  '\b': { type: 'backspace' },
  '\x03': { type: 'cancel' }, // Ctrl-C
  '\x04': { type: 'cancel' }, // Ctrl-D
  '\x10': { type: 'up' }, // Ctrl-P
  '\x0e': { type: 'down' }, // Ctrl-N
};

// Финальный символ CSI/SS3 -> событие. Остальные последовательности игнорируются.
const ARROW_KEYS: Record<string, KeyEvent> = {
  A: { type: 'up' },
  B: { type: 'down' },
};

function isCsiFinal(c: string): boolean {
  const code = c.codePointAt(0) ?? 0;
  return code >= 0x40 && code <= 0x7e;
}

/**
 * Разбор сырого ввода терминала в логические события.
 *
 * Одиночный ESC в конце блока ввода не разбирается сразу: это может быть
 * начало стрелки. Он остаётся в pending, пока не придёт продолжение
 * или вызывающий код не решит по таймауту, что это отдельная клавиша (flush()).
 */
export class KeyDecoder {
  private pending = '';

  get hasPending(): boolean {
    return this.pending.length > 0;
  }

  decode(chunk: string): KeyEvent[] {
    const chars = Array.from(this.pending + chunk);
    this.pending = '';

    const events: KeyEvent[] = [];
    let text = '';
    const flushText = () => {
      if (text) {
        events.push({ type: 'char', text });
        text = '';
      }
    };

    let i = 0;
    while (i < chars.length) {
      const c = chars[i]!;

      if (c === ESC) {
        flushText();
        const consumed = this.decodeEscape(chars, i, events);
        if (consumed === 0) {
          this.pending = chars.slice(i).join('');
          break;
        }
        i += consumed;
        continue;
      }

      const control = CONTROL_KEYS[c];
      if (control) {
        flushText();
        events.push(control);
      } else if ((c.codePointAt(0) ?? 0) >= 0x20) {
        text += c;
      }
      i++;
    }

    flushText();
    return events;
  }

  // Незавершённая последовательность по таймауту: одиночный ESC — отмена.
  flush(): KeyEvent[] {
    const pending = this.pending;
    this.pending = '';
    return pending === ESC ? [{ type: 'cancel' }] : [];
  }

  // Возвращает количество разобранных символов или 0, если последовательность не завершена.
  private decodeEscape(chars: string[], start: number, events: KeyEvent[]): number {
    const next = chars[start + 1];
    if (next === undefined) {
      return 0;
    }

    if (next === '[') {
      for (let j = start + 2; j < chars.length; j++) {
        const c = chars[j]!;
        if (isCsiFinal(c)) {
          // Стрелки без параметров; модифицированные (ESC [1;5A) игнорируются.
          const arrow = j === start + 2 ? ARROW_KEYS[c] : undefined;
          if (arrow) {
            events.push(arrow);
          }
          return j - start + 1;
        }
      }
      return 0;
    }

    if (next === 'O') {
      const final = chars[start + 2];
      if (final === undefined) {
        return 0;
      }
      const arrow = ARROW_KEYS[final];
      if (arrow) {
        events.push(arrow);
      }
      return 3;
    }

    if (next === ESC) {
      // ESC, за которым сразу идёт другая последовательность.
      events.push({ type: 'cancel' });
      return 1;
    }

    // Alt + символ.
    return 2;
  }
}
