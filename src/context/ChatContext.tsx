/**
 * Chat Context
 * State for the voice-enabled booking assistant overlay
 */

import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useReducer,
  useRef,
  useState,
  type ReactNode,
} from 'react';
import { chatApi } from '../api';
import { MAX_CHAT_MESSAGE_LENGTH } from '../config';
import { createVoiceService, type VoiceService } from '../services/voice';
import type {
  ChatContextPayload,
  ChatMessage,
  ChatResponse,
  ChatUiState,
  VoiceLocale,
  VoiceState,
} from '../types/chat';
import { stripEmojis } from '../utils/chatPayload';
import { toDisplayMessage } from '../utils/errorMessages';

export const LOADING_MESSAGE_ID = 'loading';

export const CHAT_ERROR_TEXT =
  'عذراً، حدث خطأ. يرجى المحاولة مرة أخرى.\n\nSorry, an error occurred. Please try again.';

// =============================================================================
// State & Actions
// =============================================================================

export type ChatAction =
  | { type: 'SEND_START'; payload: ChatMessage }
  | { type: 'SEND_SUCCESS'; payload: ChatMessage }
  | { type: 'SEND_FAILURE'; payload: { message: ChatMessage; error: string } }
  | { type: 'SET_ERROR'; payload: string | null }
  | { type: 'SET_INPUT'; payload: string }
  | { type: 'SET_EXPANDED'; payload: boolean }
  | { type: 'TOGGLE_EXPANDED' }
  | { type: 'SET_LOCALE'; payload: VoiceLocale }
  | { type: 'VOICE_STATE'; payload: VoiceState }
  | { type: 'CLEAR' };

export function createInitialChatState(locale: VoiceLocale = 'en-US'): ChatUiState {
  return {
    messages: [],
    isLoading: false,
    isListening: false,
    isSpeaking: false,
    inputText: '',
    interimText: '',
    isExpanded: false,
    error: null,
    voiceError: null,
    currentLocale: locale,
  };
}

function createMessage(text: string, isFromUser: boolean, extra: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: crypto.randomUUID(),
    text,
    isFromUser,
    timestamp: Date.now(),
    suggestions: [],
    isLoading: false,
    isError: false,
    ...extra,
  };
}

const loadingPlaceholder = (): ChatMessage =>
  createMessage('', false, { id: LOADING_MESSAGE_ID, isLoading: true });

function withoutPlaceholder(messages: ChatMessage[]): ChatMessage[] {
  return messages.filter((m) => m.id !== LOADING_MESSAGE_ID);
}

// =============================================================================
// Reducer
// =============================================================================

export function chatReducer(state: ChatUiState, action: ChatAction): ChatUiState {
  switch (action.type) {
    case 'SEND_START':
      return {
        ...state,
        messages: [...withoutPlaceholder(state.messages), action.payload, loadingPlaceholder()],
        inputText: '',
        error: null,
        isLoading: true,
      };

    case 'SEND_SUCCESS':
      return {
        ...state,
        messages: [...withoutPlaceholder(state.messages), action.payload],
        isLoading: false,
      };

    case 'SEND_FAILURE':
      return {
        ...state,
        messages: [...withoutPlaceholder(state.messages), action.payload.message],
        isLoading: false,
        error: action.payload.error,
      };

    case 'SET_ERROR':
      return { ...state, error: action.payload };

    case 'SET_INPUT':
      return { ...state, inputText: action.payload };

    case 'SET_EXPANDED':
      return { ...state, isExpanded: action.payload };

    case 'TOGGLE_EXPANDED':
      return { ...state, isExpanded: !state.isExpanded };

    case 'SET_LOCALE':
      if (state.currentLocale === action.payload) return state;
      return { ...state, currentLocale: action.payload };

    case 'VOICE_STATE':
      return {
        ...state,
        isListening: action.payload.isListening,
        isSpeaking: action.payload.isSpeaking,
        interimText: action.payload.interimText,
        voiceError: action.payload.error,
      };

    case 'CLEAR':
      return {
        ...createInitialChatState(state.currentLocale),
        isExpanded: state.isExpanded,
        isListening: state.isListening,
        isSpeaking: state.isSpeaking,
      };

    default:
      return state;
  }
}

/**
 * Context sent with each message, or null when there is nothing to share
 */
export function buildChatContext(pnr?: string | null, screen?: string | null): ChatContextPayload | null {
  if (!pnr && !screen) return null;
  return {
    ...(pnr ? { currentPnr: pnr } : {}),
    ...(screen ? { currentScreen: screen } : {}),
  };
}

/**
 * Speak replies in the language the assistant detected, else the UI locale
 */
export function speechLocaleFor(detectedLanguage: string | undefined, fallback: VoiceLocale): VoiceLocale {
  if (detectedLanguage === 'ar') return 'ar-SA';
  if (detectedLanguage === 'en') return 'en-US';
  return fallback;
}

function assistantMessage(response: ChatResponse): ChatMessage {
  return createMessage(response.text, false, {
    uiType: response.uiType,
    uiData: response.uiData,
    suggestions: response.suggestions,
  });
}

// =============================================================================
// Context
// =============================================================================

interface ChatContextValue extends ChatUiState {
  sessionId: string;
  isVoiceAvailable: boolean;
  sendMessage: (text?: string, locale?: VoiceLocale) => Promise<void>;
  onSuggestionTapped: (suggestion: string) => Promise<void>;
  updateInputText: (text: string) => void;
  updateContext: (pnr?: string | null, screen?: string | null) => void;
  clearChat: () => Promise<void>;
  toggleExpanded: () => void;
  setExpanded: (expanded: boolean) => void;
  setLocale: (locale: VoiceLocale) => void;
  startListening: () => void;
  stopListening: () => void;
  toggleListening: () => void;
  setListening: (listening: boolean) => void;
  stopSpeaking: () => void;
  clearError: () => void;
}

const ChatContext = createContext<ChatContextValue | null>(null);

// =============================================================================
// Provider
// =============================================================================

interface ChatProviderProps {
  children: ReactNode;
  /** Injected in tests; defaults to the browser implementation */
  voiceService?: VoiceService;
  initialLocale?: VoiceLocale;
}

export function ChatProvider({ children, voiceService, initialLocale = 'en-US' }: ChatProviderProps) {
  const [state, dispatch] = useReducer(chatReducer, initialLocale, createInitialChatState);
  const [voice] = useState<VoiceService>(() => voiceService ?? createVoiceService());

  const sessionIdRef = useRef<string>(crypto.randomUUID());
  const contextRef = useRef<ChatContextPayload | null>(null);
  const stateRef = useRef(state);
  stateRef.current = state;

  const sendMessage = useCallback(
    async (text?: string, locale?: VoiceLocale) => {
      const messageText = (text ?? stateRef.current.inputText).trim();
      const requestLocale = locale ?? stateRef.current.currentLocale;
      if (!messageText) return;

      if (messageText.length > MAX_CHAT_MESSAGE_LENGTH) {
        dispatch({
          type: 'SET_ERROR',
          payload: `Message is too long (max ${MAX_CHAT_MESSAGE_LENGTH} characters)`,
        });
        return;
      }

      dispatch({ type: 'SEND_START', payload: createMessage(messageText, true) });
      const sessionId = sessionIdRef.current;

      try {
        const response = await chatApi.sendMessage({
          sessionId,
          message: messageText,
          locale: requestLocale,
          context: contextRef.current ?? undefined,
        });
        // Replies to a cleared session are dropped
        if (sessionIdRef.current !== sessionId) return;

        dispatch({ type: 'SEND_SUCCESS', payload: assistantMessage(response) });

        if (voice.isSynthesisAvailable && response.text.trim()) {
          voice.speak(
            stripEmojis(response.text),
            speechLocaleFor(response.detectedLanguage, requestLocale)
          );
        }
      } catch (err) {
        console.warn('Chat message failed:', err);
        if (sessionIdRef.current !== sessionId) return;
        dispatch({
          type: 'SEND_FAILURE',
          payload: {
            message: createMessage(CHAT_ERROR_TEXT, false, { isError: true }),
            error: toDisplayMessage(err),
          },
        });
      }
    },
    [voice]
  );

  const sendMessageRef = useRef(sendMessage);
  sendMessageRef.current = sendMessage;

  // Mirror voice state and send final transcripts
  useEffect(() => {
    const unsubscribeState = voice.subscribe((voiceState) => {
      dispatch({ type: 'VOICE_STATE', payload: voiceState });
    });
    const unsubscribeTranscript = voice.onTranscript((transcript) => {
      if (transcript.trim()) {
        void sendMessageRef.current(transcript, stateRef.current.currentLocale);
      }
    });

    return () => {
      unsubscribeState();
      unsubscribeTranscript();
      voice.stopListening();
      voice.stopSpeaking();
    };
  }, [voice]);

  const clearChat = useCallback(async () => {
    const previousSessionId = sessionIdRef.current;
    sessionIdRef.current = crypto.randomUUID();
    dispatch({ type: 'CLEAR' });

    try {
      await chatApi.clearSession(previousSessionId);
    } catch (err) {
      console.warn('Failed to clear chat session on server:', err);
    }
  }, []);

  const startListening = useCallback(() => {
    voice.stopSpeaking();
    voice.startListening(stateRef.current.currentLocale);
  }, [voice]);

  const stopListening = useCallback(() => voice.stopListening(), [voice]);

  const setListening = useCallback(
    (listening: boolean) => (listening ? startListening() : stopListening()),
    [startListening, stopListening]
  );

  const updateContext = useCallback((pnr?: string | null, screen?: string | null) => {
    contextRef.current = buildChatContext(pnr, screen);
  }, []);

  const setLocale = useCallback(
    (locale: VoiceLocale) => dispatch({ type: 'SET_LOCALE', payload: locale }),
    []
  );

  const value: ChatContextValue = {
    ...state,
    sessionId: sessionIdRef.current,
    isVoiceAvailable: voice.isRecognitionAvailable,
    sendMessage,
    onSuggestionTapped: (suggestion) => sendMessage(suggestion),
    updateInputText: (text) => dispatch({ type: 'SET_INPUT', payload: text }),
    updateContext,
    clearChat,
    toggleExpanded: () => dispatch({ type: 'TOGGLE_EXPANDED' }),
    setExpanded: (expanded) => dispatch({ type: 'SET_EXPANDED', payload: expanded }),
    setLocale,
    startListening,
    stopListening,
    toggleListening: () => setListening(!state.isListening),
    setListening,
    stopSpeaking: () => voice.stopSpeaking(),
    clearError: () => dispatch({ type: 'SET_ERROR', payload: null }),
  };

  return <ChatContext.Provider value={value}>{children}</ChatContext.Provider>;
}

// =============================================================================
// Hook
// =============================================================================

export function useChat(): ChatContextValue {
  const context = useContext(ChatContext);
  if (!context) {
    throw new Error('useChat must be used within ChatProvider');
  }
  return context;
}
