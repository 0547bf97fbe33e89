import { describe, expect, it } from 'vitest';

import { buildInlineKeyboard, normalizeUpdate, parseCommand } from '../src/normalizers';
import type { TelegramUpdate } from '../src/types';

const sender = { id: 4242, is_bot: false, first_name: 'Ada', username: 'ada_l' };
const chat = { id: 4242, type: 'private' as const };

describe('normalizeUpdate', () => {
  it('normalizes plain text messages', () => {
    const update: TelegramUpdate = {
      update_id: 10,
      message: { message_id: 7, date: 1_760_000_000, chat, from: sender, text: '  What is dharma?  ' },
    };

    expect(normalizeUpdate(update)).toEqual({
      type: 'text',
      updateId: 10,
      chatId: 4242,
      sender: { userId: '4242', username: 'ada_l', firstName: 'Ada' },
      timestamp: 1_760_000_000_000,
      messageId: 7,
      text: 'What is dharma?',
    });
  });

  it('normalizes commands addressed to the bot', () => {
    const update: TelegramUpdate = {
      update_id: 11,
      message: { message_id: 8, date: 1, chat, from: sender, text: '/ListSessions@guide_bot now' },
    };

    expect(normalizeUpdate(update)).toMatchObject({
      type: 'command',
      command: 'listsessions',
      args: 'now',
    });
  });

  it('normalizes callback queries', () => {
    const update: TelegramUpdate = {
      update_id: 12,
      callback_query: {
        id: 'cb-1',
        from: { ...sender, username: undefined },
        data: 'select_session:abc',
        message: { message_id: 99, date: 2, chat },
      },
    };

    expect(normalizeUpdate(update)).toEqual({
      type: 'callback',
      updateId: 12,
      chatId: 4242,
      sender: { userId: '4242', username: undefined, firstName: 'Ada' },
      timestamp: 2000,
      callbackQueryId: 'cb-1',
      messageId: 99,
      data: 'select_session:abc',
    });
  });

  it('ignores bots, edits and empty messages', () => {
    expect(
      normalizeUpdate({
        update_id: 1,
        message: { message_id: 1, date: 1, chat, from: { ...sender, is_bot: true }, text: 'hi' },
      }),
    ).toBeUndefined();
    expect(
      normalizeUpdate({
        update_id: 2,
        edited_message: { message_id: 1, date: 1, chat, from: sender, text: 'edited' },
      }),
    ).toBeUndefined();
    expect(
      normalizeUpdate({ update_id: 3, message: { message_id: 1, date: 1, chat, from: sender } }),
    ).toBeUndefined();
    expect(
      normalizeUpdate({ update_id: 4, callback_query: { id: 'cb', from: sender } }),
    ).toBeUndefined();
  });
});

describe('parseCommand', () => {
  it('splits the command from its arguments', () => {
    expect(parseCommand('/start')).toEqual({ command: 'start', args: '' });
    expect(parseCommand('/help@guide_bot   please ')).toEqual({ command: 'help', args: 'please' });
  });

  it('rejects text that is not a command', () => {
    expect(parseCommand('hello /start')).toBeUndefined();
    expect(parseCommand('/')).toBeUndefined();
  });
});

describe('buildInlineKeyboard', () => {
  it('copies rows of buttons', () => {
    const keyboard = buildInlineKeyboard([
      [
        { text: 'Yes', callback_data: 'confirm_delete' },
        { text: 'No', callback_data: 'cancel_delete' },
      ],
    ]);

    expect(keyboard).toEqual({
      inline_keyboard: [
        [
          { text: 'Yes', callback_data: 'confirm_delete' },
          { text: 'No', callback_data: 'cancel_delete' },
        ],
      ],
    });
  });

  it('rejects callback data beyond 64 bytes', () => {
    expect(() =>
      buildInlineKeyboard([[{ text: 'Too long', callback_data: 'x'.repeat(65) }]]),
    ).toThrow(/exceeds 64 bytes/);
  });
});
