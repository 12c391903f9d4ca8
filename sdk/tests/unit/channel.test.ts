import { describe, expect, it, vi } from 'vitest';
import { ChatChannel, chatSocketUrl, parseServerMessage } from '../../src/channel.js';
import { KincareValidationError } from '../../src/errors.js';

const SESSION_ID = '6f1c1b9e-4a53-4c8e-9d3e-2f0f6c7f1a11';

function setup() {
  const sent: string[] = [];
  const channel = new ChatChannel({ send: (data) => sent.push(data) });
  return { channel, sent };
}

describe('chatSocketUrl()', () => {
  it('swaps the scheme and drops the API prefix', () => {
    expect(chatSocketUrl('http://localhost:3000/v1')).toBe('ws://localhost:3000/ws/chat');
    expect(chatSocketUrl('https://care.example.test/')).toBe('wss://care.example.test/ws/chat');
  });
});

describe('parseServerMessage()', () => {
  it('decodes each frame type', () => {
    expect(parseServerMessage(JSON.stringify({ type: 'token', sessionId: SESSION_ID, content: 'Your' }))).toEqual({
      type: 'token',
      sessionId: SESSION_ID,
      content: 'Your',
    });
    expect(
      parseServerMessage(
        JSON.stringify({ type: 'context', sessionId: SESSION_ID, labEventIds: ['lab-a1c'], droppedUnits: 0 }),
      ),
    ).toEqual({ type: 'context', sessionId: SESSION_ID, labEventIds: ['lab-a1c'], droppedUnits: 0 });
    expect(
      parseServerMessage(
        JSON.stringify({
          type: 'error',
          sessionId: null,
          code: 'VALIDATION_ERROR',
          message: 'A message or an image is required',
          retryable: false,
        }),
      ),
    ).toEqual({
      type: 'error',
      sessionId: null,
      code: 'VALIDATION_ERROR',
      message: 'A message or an image is required',
      retryable: false,
    });
  });

  it('drops fields the frame type does not carry', () => {
    expect(
      parseServerMessage(JSON.stringify({ type: 'session', sessionId: SESSION_ID, title: 'New Chat', extra: 1 })),
    ).toEqual({ type: 'session', sessionId: SESSION_ID, title: 'New Chat' });
  });

  it('returns null for malformed or unknown frames', () => {
    expect(parseServerMessage('not json')).toBeNull();
    expect(parseServerMessage('[]')).toBeNull();
    expect(parseServerMessage(JSON.stringify({ type: 'ping' }))).toBeNull();
    expect(parseServerMessage(JSON.stringify({ type: 'token', sessionId: SESSION_ID }))).toBeNull();
    expect(
      parseServerMessage(
        JSON.stringify({ type: 'error', sessionId: null, code: 'TEAPOT', message: 'x', retryable: false }),
      ),
    ).toBeNull();
  });
});

describe('ChatChannel', () => {
  it('dispatches frames to listeners of their type only', () => {
    const { channel } = setup();
    const tokens: string[] = [];
    const done = vi.fn();
    channel.on('token', (message) => tokens.push(message.content));
    channel.on('done', done);

    channel.receive(JSON.stringify({ type: 'token', sessionId: SESSION_ID, content: 'Your A1C' }));
    channel.receive(JSON.stringify({ type: 'token', sessionId: SESSION_ID, content: ' was 5.8%' }));
    channel.receive(
      JSON.stringify({
        type: 'done',
        sessionId: SESSION_ID,
        messageId: 'msg-2',
        content: 'Your A1C was 5.8%',
        model: 'test-chat-model',
        truncated: false,
      }),
    );

    expect(tokens.join('')).toBe('Your A1C was 5.8%');
    expect(done).toHaveBeenCalledTimes(1);
    expect(done).toHaveBeenCalledWith({
      type: 'done',
      sessionId: SESSION_ID,
      messageId: 'msg-2',
      content: 'Your A1C was 5.8%',
      model: 'test-chat-model',
      truncated: false,
    });
  });

  it('stops calling a listener after unsubscribe', () => {
    const { channel } = setup();
    const listener = vi.fn();
    const off = channel.on('session', listener);

    off();
    channel.receive(JSON.stringify({ type: 'session', sessionId: SESSION_ID, title: 'New Chat' }));

    expect(listener).not.toHaveBeenCalled();
  });

  it('ignores frames it cannot decode', () => {
    const { channel } = setup();
    const listener = vi.fn();
    channel.on('token', listener);

    expect(channel.receive('{"type":"token"}')).toBeNull();
    expect(listener).not.toHaveBeenCalled();
  });

  it('sends chat and cancel frames', () => {
    const { channel, sent } = setup();

    channel.sendMessage({ familyMemberId: 'member-ana', message: 'what was my A1C' });
    channel.cancel(SESSION_ID);

    expect(sent).toEqual([
      JSON.stringify({ type: 'chat', familyMemberId: 'member-ana', message: 'what was my A1C' }),
      JSON.stringify({ type: 'cancel', sessionId: SESSION_ID }),
    ]);
  });

  it('allows an image without text but refuses an empty turn', () => {
    const { channel, sent } = setup();

    channel.sendMessage({ familyMemberId: 'member-ana', message: '', image: 'aGVsbG8=' });

    expect(() => channel.sendMessage({ familyMemberId: 'member-ana', message: '   ' })).toThrow(
      KincareValidationError,
    );
    expect(sent).toHaveLength(1);
  });
});
