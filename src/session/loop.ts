import type { SelectionSession } from './session.js';
import type { KeyEvent, Renderer } from './types.js';

/**
 * Цикл сессии: первый кадр, затем события по одному.
 *
 * Ожидание следующего события — единственная точка приостановки. Возвращает
 * данные выбранного элемента; undefined при отмене, подтверждении на пустом
 * списке или конце ввода. Ошибки renderer-а и scorer-а не перехватываются.
 */
export async function runSession<T>(
  session: SelectionSession<T>,
  input: AsyncIterable<KeyEvent>,
  renderer: Renderer<T>,
): Promise<T | undefined> {
  renderer.draw(session.render(), session.query);

  for await (const event of input) {
    switch (event.type) {
    case 'confirm':
      return session.onConfirm();
    case 'cancel':
      return session.onCancel();
    case 'char':
      session.onQueryAppend(event.text);
      break;
    case 'backspace':
      session.onQueryBackspace();
      break;
    case 'up':
      session.onMoveUp();
      break;
    case 'down':
      session.onMoveDown();
      break;
    }

    renderer.draw(session.render(), session.query);
  }

  // Ввод закончился без подтверждения.
  return session.onCancel();
}
