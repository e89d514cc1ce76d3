import { InlineKeyboard } from 'grammy';
import { MESSAGE_CHUNK_SIZE, chunkText } from '../utils/text';
import type { BotReply, ButtonRows } from '../../types';

export interface ReplyPage {
  text: string;
  /** Only the last page carries the keyboard */
  buttons: ButtonRows | null;
}

export function toInlineKeyboard(rows: ButtonRows): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    for (const button of row) {
      keyboard.text(button.text, button.action);
    }
    if (index < rows.length - 1) {
      keyboard.row();
    }
  });
  return keyboard;
}

/** Split a reply into sendable messages, keyboard on the last one. */
export function paginateReply(reply: BotReply, size: number = MESSAGE_CHUNK_SIZE): ReplyPage[] {
  const chunks = chunkText(reply.text, size);
  return chunks.map((text, index) => ({
    text,
    buttons: index === chunks.length - 1 && reply.buttons.length > 0 ? reply.buttons : null,
  }));
}
