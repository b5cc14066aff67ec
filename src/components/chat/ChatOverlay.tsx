/**
 * ChatOverlay Component
 * Voice-enabled booking assistant reachable from every screen
 *
 * Features:
 * - Floating chat bubble
 * - Expandable chat panel
 * - Flight and booking cards inside replies
 * - Voice input with live transcription
 * - 500 character limit per message
 */

import { useEffect, useRef, type ChangeEvent, type FormEvent } from 'react';
import { useLocation } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { MAX_CHAT_MESSAGE_LENGTH } from '../../config';
import { useBooking } from '../../context/BookingContext';
import { useChat } from '../../context/ChatContext';
import { voiceLocaleFor } from '../../i18n/languages';
import type { ChatMessage } from '../../types/chat';
import { containsArabic, stripEmojis } from '../../utils/chatPayload';
import BookingSummaryCard from './BookingSummaryCard';
import FlightListCard from './FlightListCard';
import SuggestionChips from './SuggestionChips';

/**
 * "/payment" -> "payment", "/" -> "search"
 */
export function screenFromPath(pathname: string): string {
  const segment = pathname.split('/').filter(Boolean)[0];
  return segment ?? 'search';
}

interface MessageBubbleProps {
  message: ChatMessage;
  showSuggestions: boolean;
  isBusy: boolean;
  onSend: (text: string) => void;
}

function MessageBubble({ message, showSuggestions, isBusy, onSend }: MessageBubbleProps) {
  if (message.isLoading) {
    return (
      <div className="chat-message chat-message--assistant chat-message--loading" data-testid="chat-loading">
        <div className="chat-typing-indicator">
          <span></span>
          <span></span>
          <span></span>
        </div>
      </div>
    );
  }

  const text = message.isFromUser ? message.text : stripEmojis(message.text);
  const role = message.isFromUser ? 'user' : 'assistant';

  return (
    <div className={`chat-message chat-message--${role} ${message.isError ? 'chat-message--error' : ''}`}>
      {text.trim() && (
        <div className="chat-message__content" dir={containsArabic(text) ? 'rtl' : 'ltr'}>
          {text}
        </div>
      )}

      {message.uiType === 'FLIGHT_LIST' && (
        <FlightListCard
          uiData={message.uiData}
          onSelectFlight={(flightNumber) => onSend(`Select flight ${flightNumber}`)}
          disabled={isBusy}
        />
      )}
      {message.uiType === 'BOOKING_SUMMARY' && <BookingSummaryCard uiData={message.uiData} />}

      {showSuggestions && (
        <SuggestionChips suggestions={message.suggestions} onSelect={onSend} disabled={isBusy} />
      )}

      <time className="chat-message__time">
        {new Date(message.timestamp).toLocaleTimeString([], {
          hour: '2-digit',
          minute: '2-digit',
        })}
      </time>
    </div>
  );
}

export function ChatOverlay() {
  const { t, i18n } = useTranslation();
  const location = useLocation();
  const { confirmation } = useBooking();
  const chat = useChat();
  const {
    messages,
    isLoading,
    isListening,
    inputText,
    interimText,
    isExpanded,
    error,
    voiceError,
    isVoiceAvailable,
    updateContext,
    setLocale,
  } = chat;

  const messagesEndRef = useRef<HTMLDivElement>(null);
  const inputRef = useRef<HTMLInputElement>(null);

  // Keep the assistant aware of where the traveller is
  useEffect(() => {
    updateContext(confirmation?.pnr ?? null, screenFromPath(location.pathname));
  }, [confirmation?.pnr, location.pathname, updateContext]);

  // Follow the app language
  useEffect(() => {
    setLocale(voiceLocaleFor(i18n.language));
  }, [i18n.language, setLocale]);

  // Scroll to bottom when new messages arrive
  useEffect(() => {
    if (messagesEndRef.current?.scrollIntoView) {
      messagesEndRef.current.scrollIntoView({ behavior: 'smooth' });
    }
  }, [messages, interimText]);

  // Focus input when chat opens
  useEffect(() => {
    if (isExpanded && inputRef.current) {
      inputRef.current.focus();
    }
  }, [isExpanded]);

  const handleInputChange = (e: ChangeEvent<HTMLInputElement>) => {
    const value = e.target.value;
    if (value.length <= MAX_CHAT_MESSAGE_LENGTH) {
      chat.updateInputText(value);
    }
  };

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    if (!inputText.trim() || isLoading) return;
    void chat.sendMessage();
  };

  const send = (text: string) => {
    void chat.onSuggestionTapped(text);
  };

  const remainingChars = MAX_CHAT_MESSAGE_LENGTH - inputText.length;
  const lastMessage = messages[messages.length - 1];
  const visibleError = error ?? voiceError;

  return (
    <div className="chat-overlay">
      {/* Chat Toggle Button */}
      <button
        className={`chat-toggle ${isExpanded ? 'chat-toggle--open' : ''}`}
        onClick={chat.toggleExpanded}
        aria-label={isExpanded ? t('chat.close') : t('chat.open')}
        aria-expanded={isExpanded}
      >
        <span className="chat-toggle__icon">{isExpanded ? '×' : '💬'}</span>
      </button>

      {/* Chat Panel */}
      {isExpanded && (
        <div className="chat-panel" role="dialog" aria-label={t('chat.title')}>
          <header className="chat-header">
            <h3>{t('chat.title')}</h3>
            <div className="chat-header__actions">
              {messages.length > 0 && (
                <button
                  className="chat-clear-btn"
                  onClick={() => void chat.clearChat()}
                  aria-label={t('chat.clear')}
                >
                  ⟲
                </button>
              )}
            </div>
          </header>

          <div className="chat-messages" role="log" aria-live="polite">
            {messages.length === 0 ? (
              <div className="chat-empty">
                <p>{t('chat.welcome')}</p>
              </div>
            ) : (
              messages.map((message) => (
                <MessageBubble
                  key={message.id}
                  message={message}
                  showSuggestions={!message.isFromUser && message === lastMessage}
                  isBusy={isLoading}
                  onSend={send}
                />
              ))
            )}
            {isListening && interimText && (
              <div className="chat-message chat-message--user chat-message--interim">
                <div className="chat-message__content">{interimText}</div>
              </div>
            )}
            <div ref={messagesEndRef} />
          </div>

          {visibleError && (
            <div className="chat-error" role="alert">
              {visibleError}
            </div>
          )}

          <form className="chat-input-form" onSubmit={handleSubmit}>
            <div className="chat-input-wrapper">
              <input
                ref={inputRef}
                type="text"
                value={inputText}
                onChange={handleInputChange}
                placeholder={isListening ? t('chat.listening') : t('chat.inputPlaceholder')}
                disabled={isLoading}
                maxLength={MAX_CHAT_MESSAGE_LENGTH}
                aria-label={t('chat.inputPlaceholder')}
              />
              <span
                className={`chat-char-count ${remainingChars < 50 ? 'chat-char-count--warning' : ''}`}
              >
                {remainingChars}
              </span>
            </div>
            {isVoiceAvailable && (
              <button
                type="button"
                className={`chat-mic-btn ${isListening ? 'chat-mic-btn--active' : ''}`}
                onClick={chat.toggleListening}
                aria-label={isListening ? t('chat.stopVoice') : t('chat.startVoice')}
                aria-pressed={isListening}
              >
                🎤
              </button>
            )}
            <button
              type="submit"
              disabled={!inputText.trim() || isLoading}
              aria-label={t('chat.send')}
            >
              ➤
            </button>
          </form>
        </div>
      )}
    </div>
  );
}

export default ChatOverlay;
