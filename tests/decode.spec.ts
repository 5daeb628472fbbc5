import { describe, expect, it } from 'vitest';
import { decodeMessage } from '@/lib/chat/decode';
import { DecodeError } from '@/lib/chat/errors';

describe('decodeMessage', () => {
  it('maps a row to a message', () => {
    expect(
      decodeMessage({
        id: 'm1',
        group_id: 'group-1',
        sender_id: 'user-b',
        content: 'see you at the library',
        created_at: '2024-05-01T10:00:00.000Z',
        client_msg_id: 'tok-1',
      })
    ).toEqual({
      id: 'm1',
      conversationId: 'group-1',
      senderId: 'user-b',
      content: 'see you at the library',
      createdAt: '2024-05-01T10:00:00.000Z',
      clientMsgId: 'tok-1',
    });
  });

  it('normalizes numeric ids and a missing correlation token', () => {
    const message = decodeMessage({
      id: 42,
      group_id: 7,
      sender_id: 'user-b',
      content: 'hi',
      created_at: '2024-05-01T10:00:00Z',
    });

    expect(message.id).toBe('42');
    expect(message.conversationId).toBe('7');
    expect(message.clientMsgId).toBeNull();
  });

  it('rejects blank content', () => {
    const decode = () =>
      decodeMessage({ id: 'm1', group_id: 'g', sender_id: 'u', content: '   ', created_at: '2024-05-01T10:00:00Z' });

    expect(decode).toThrow(DecodeError);
    expect(decode).toThrow('Malformed message row (content: content must not be blank)');
  });

  it('rejects unparseable timestamps and lists every issue', () => {
    try {
      decodeMessage({ id: 'm1', group_id: 'g', content: 'hi', created_at: 'yesterday' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      expect(error instanceof DecodeError && error.issues).toEqual([
        'sender_id: Required',
        'created_at: created_at must be a timestamp',
      ]);
    }
  });

  it('rejects values that are not objects', () => {
    expect(() => decodeMessage(null)).toThrow(DecodeError);
  });
});
