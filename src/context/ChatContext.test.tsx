/**
 * ChatContext Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import type { ReactNode } from 'react';
import {
  buildChatContext,
  chatReducer,
  ChatProvider,
  createInitialChatState,
  LOADING_MESSAGE_ID,
  speechLocaleFor,
  useChat,
} from './ChatContext';
import { chatApi } from '../api';
import { NoopVoiceService } from '../services/voice';
import type { ChatMessage } from '../types/chat';

vi.mock('../api', () => ({
  chatApi: {
    sendMessage: vi.fn(),
    clearSession: vi.fn(),
  },
}));

function message(id: string, text: string, isFromUser: boolean): ChatMessage {
  return {
    id,
    text,
    isFromUser,
    timestamp: 0,
    suggestions: [],
    isLoading: false,
    isError: false,
  };
}

const wrapper = ({ children }: { children: ReactNode }) => (
  <ChatProvider voiceService={new NoopVoiceService()}>{children}</ChatProvider>
);

describe('chatReducer', () => {
  it('appends the user message and a loading placeholder on send', () => {
    const state = chatReducer(
      { ...createInitialChatState(), inputText: 'hi' },
      { type: 'SEND_START', payload: message('u1', 'hi', true) }
    );

    expect(state.messages.map((m) => m.id)).toEqual(['u1', LOADING_MESSAGE_ID]);
    expect(state.inputText).toBe('');
    expect(state.isLoading).toBe(true);
  });

  it('replaces the placeholder with the reply', () => {
    const sending = chatReducer(createInitialChatState(), {
      type: 'SEND_START',
      payload: message('u1', 'hi', true),
    });
    const state = chatReducer(sending, { type: 'SEND_SUCCESS', payload: message('a1', 'hello', false) });

    expect(state.messages.map((m) => m.id)).toEqual(['u1', 'a1']);
    expect(state.isLoading).toBe(false);
  });

  it('records the error on failure', () => {
    const sending = chatReducer(createInitialChatState(), {
      type: 'SEND_START',
      payload: message('u1', 'hi', true),
    });
    const state = chatReducer(sending, {
      type: 'SEND_FAILURE',
      payload: { message: message('e1', 'sorry', false), error: 'Request timed out' },
    });

    expect(state.messages.map((m) => m.id)).toEqual(['u1', 'e1']);
    expect(state.error).toBe('Request timed out');
  });

  it('keeps the locale and panel state when cleared', () => {
    const state = chatReducer(
      {
        ...createInitialChatState('ar-SA'),
        isExpanded: true,
        messages: [message('u1', 'hi', true)],
        error: 'x',
      },
      { type: 'CLEAR' }
    );

    expect(state.messages).toEqual([]);
    expect(state.error).toBeNull();
    expect(state.currentLocale).toBe('ar-SA');
    expect(state.isExpanded).toBe(true);
  });

  it('returns the same state when the locale is unchanged', () => {
    const initial = createInitialChatState('en-US');
    expect(chatReducer(initial, { type: 'SET_LOCALE', payload: 'en-US' })).toBe(initial);
  });

  it('mirrors voice state', () => {
    const state = chatReducer(createInitialChatState(), {
      type: 'VOICE_STATE',
      payload: { isListening: true, isSpeaking: false, interimText: 'book', error: null },
    });

    expect(state.isListening).toBe(true);
    expect(state.interimText).toBe('book');
  });
});

describe('buildChatContext', () => {
  it('returns null when nothing is known', () => {
    expect(buildChatContext(null, null)).toBeNull();
  });

  it('includes only the known fields', () => {
    expect(buildChatContext('ABC123', null)).toEqual({ currentPnr: 'ABC123' });
    expect(buildChatContext(null, 'payment')).toEqual({ currentScreen: 'payment' });
  });
});

describe('speechLocaleFor', () => {
  it('follows the detected language', () => {
    expect(speechLocaleFor('ar', 'en-US')).toBe('ar-SA');
    expect(speechLocaleFor('en', 'ar-SA')).toBe('en-US');
  });

  it('falls back to the request locale', () => {
    expect(speechLocaleFor(undefined, 'ar-SA')).toBe('ar-SA');
    expect(speechLocaleFor('fr', 'en-US')).toBe('en-US');
  });
});

describe('ChatProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws when used outside the provider', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useChat())).toThrow('useChat must be used within ChatProvider');
    errorSpy.mockRestore();
  });

  it('rejects messages over 500 characters', async () => {
    const { result } = renderHook(() => useChat(), { wrapper });

    await act(async () => {
      await result.current.sendMessage('a'.repeat(501));
    });

    expect(chatApi.sendMessage).not.toHaveBeenCalled();
    expect(result.current.error).toBe('Message is too long (max 500 characters)');
  });

  it('ignores blank messages', async () => {
    const { result } = renderHook(() => useChat(), { wrapper });

    await act(async () => {
      await result.current.sendMessage('   ');
    });

    expect(chatApi.sendMessage).not.toHaveBeenCalled();
    expect(result.current.messages).toEqual([]);
  });

  it('sends the input text with the booking context', async () => {
    vi.mocked(chatApi.sendMessage).mockResolvedValue({
      text: 'Your booking is confirmed',
      uiType: 'BOOKING_SUMMARY',
      uiData: '{"pnr":"ABC123"}',
      suggestions: ['Check in'],
    });
    const { result } = renderHook(() => useChat(), { wrapper });

    act(() => {
      result.current.updateInputText('  status please  ');
      result.current.updateContext('ABC123', 'confirmation');
    });
    await act(async () => {
      await result.current.sendMessage();
    });

    expect(chatApi.sendMessage).toHaveBeenCalledWith({
      sessionId: result.current.sessionId,
      message: 'status please',
      locale: 'en-US',
      context: { currentPnr: 'ABC123', currentScreen: 'confirmation' },
    });
    const reply = result.current.messages[1];
    expect(reply.uiType).toBe('BOOKING_SUMMARY');
    expect(reply.suggestions).toEqual(['Check in']);
  });

  it('starts a new session when cleared even if the server call fails', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.mocked(chatApi.clearSession).mockRejectedValue(new Error('offline'));
    const { result } = renderHook(() => useChat(), { wrapper });
    const firstSession = result.current.sessionId;

    await act(async () => {
      await result.current.clearChat();
    });

    expect(chatApi.clearSession).toHaveBeenCalledWith(firstSession);
    expect(result.current.sessionId).not.toBe(firstSession);
    expect(warnSpy).toHaveBeenCalled();
    warnSpy.mockRestore();
  });

  it('drops a reply that arrives after the chat was cleared', async () => {
    let resolveReply: (value: { text: string; suggestions: string[] }) => void = () => {};
    vi.mocked(chatApi.sendMessage).mockImplementation(
      () => new Promise((resolve) => {
        resolveReply = resolve;
      })
    );
    vi.mocked(chatApi.clearSession).mockResolvedValue(undefined);
    const { result } = renderHook(() => useChat(), { wrapper });
    const firstSession = result.current.sessionId;

    let pending: Promise<void> = Promise.resolve();
    act(() => {
      pending = result.current.sendMessage('find flights to Jeddah');
    });
    expect(result.current.messages).toHaveLength(2);

    await act(async () => {
      await result.current.clearChat();
    });
    expect(chatApi.clearSession).toHaveBeenCalledWith(firstSession);
    expect(result.current.messages).toEqual([]);

    await act(async () => {
      resolveReply({ text: 'Here are some flights', suggestions: [] });
      await pending;
    });

    expect(result.current.messages).toEqual([]);
    expect(result.current.isLoading).toBe(false);
    expect(result.current.sessionId).not.toBe(firstSession);
  });

  it('reports no voice support with the fallback service', () => {
    const { result } = renderHook(() => useChat(), { wrapper });
    expect(result.current.isVoiceAvailable).toBe(false);
  });
});
