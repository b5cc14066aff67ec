/**
 * SkyFare API Client
 * Handles all backend communication
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import {
  API_BASE_URL,
  API_PREFIX,
  DEFAULT_CURRENCY,
  REQUEST_TIMEOUT_MS,
} from '../config';
import type {
  BookingConfirmation,
  BookingRequest,
  FareFamilyOffer,
  FareInclusions,
  Flight,
  FlightSearchRequest,
  FlightSearchResponse,
  RouteMap,
  Station,
} from '../types';
import { isChatUiType, type ChatRequest, type ChatResponse } from '../types/chat';

// =============================================================================
// Client Instance
// =============================================================================

const client: AxiosInstance = axios.create({
  baseURL: API_BASE_URL,
  timeout: REQUEST_TIMEOUT_MS,
  headers: {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  },
});

export const API_ROUTES = {
  STATIONS: `${API_PREFIX}/config/stations`,
  ROUTES: `${API_PREFIX}/config/routes`,
  SEARCH: `${API_PREFIX}/search`,
  BOOKING: `${API_PREFIX}/booking`,
  bookingByPnr: (pnr: string) =>
    `${API_PREFIX}/booking/${encodeURIComponent(pnr.trim().toUpperCase())}`,
  CHAT_MESSAGE: `${API_PREFIX}/chat/message`,
  chatSession: (sessionId: string) =>
    `${API_PREFIX}/chat/sessions/${encodeURIComponent(sessionId)}`,
  HEALTH: '/health',
} as const;

// =============================================================================
// Error Handling
// =============================================================================

const RETRYABLE_CODES = ['NETWORK_ERROR', 'TIMEOUT', 'SERVER_ERROR', 'HTTP_429'];

export class ApiError extends Error {
  constructor(
    public status: number,
    public message: string,
    public code: string
  ) {
    super(message);
    this.name = 'ApiError';
  }

  get isRetryable(): boolean {
    return RETRYABLE_CODES.includes(this.code);
  }
}

function readString(data: unknown, key: string): string | undefined {
  if (typeof data !== 'object' || data === null || !(key in data)) {
    return undefined;
  }
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function handleError(error: unknown): never {
  if (error instanceof ApiError) {
    throw error;
  }

  if (!isAxiosError(error)) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ApiError(0, message || 'Unknown error', 'ERROR');
  }

  if (error.response) {
    const { status, data } = error.response;
    if (status >= 500) {
      throw new ApiError(status, `Server error: ${status}`, 'SERVER_ERROR');
    }
    throw new ApiError(
      status,
      readString(data, 'detail') ||
        readString(data, 'message') ||
        readString(data, 'error') ||
        'Request failed',
      readString(data, 'code') || `HTTP_${status}`
    );
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    throw new ApiError(0, 'Request timed out', 'TIMEOUT');
  }

  if (error.request) {
    throw new ApiError(0, 'Network error - please check your connection', 'NETWORK_ERROR');
  }

  throw new ApiError(0, error.message || 'Unknown error', 'ERROR');
}

// =============================================================================
// Response normalisation
// =============================================================================

interface RawFareOffer extends Partial<Omit<FareFamilyOffer, 'inclusions'>> {
  inclusions?: Partial<FareInclusions> | null;
}

interface RawFlight extends Partial<Omit<Flight, 'fareFamilies'>> {
  fareFamilies?: RawFareOffer[] | null;
}

function normalizeInclusions(inclusions: Partial<FareInclusions> | null | undefined): FareInclusions {
  return {
    carryOnBag: inclusions?.carryOnBag ?? '',
    checkedBag: inclusions?.checkedBag ?? null,
    seatSelection: inclusions?.seatSelection ?? '',
    changePolicy: inclusions?.changePolicy ?? '',
    cancellationPolicy: inclusions?.cancellationPolicy ?? '',
    priorityBoarding: inclusions?.priorityBoarding ?? false,
    loungeAccess: inclusions?.loungeAccess ?? false,
  };
}

function normalizeFareOffer(offer: RawFareOffer): FareFamilyOffer {
  return {
    code: offer.code ?? '',
    name: offer.name ?? '',
    priceMinor: offer.priceMinor ?? 0,
    priceFormatted: offer.priceFormatted ?? '',
    currency: offer.currency || DEFAULT_CURRENCY,
    inclusions: normalizeInclusions(offer.inclusions),
  };
}

function normalizeFlight(flight: RawFlight): Flight {
  return {
    flightNumber: flight.flightNumber ?? '',
    origin: flight.origin ?? '',
    destination: flight.destination ?? '',
    departureTime: flight.departureTime ?? '',
    arrivalTime: flight.arrivalTime ?? '',
    durationMinutes: flight.durationMinutes ?? 0,
    durationFormatted: flight.durationFormatted ?? '',
    aircraft: flight.aircraft ?? '',
    fareFamilies: (flight.fareFamilies ?? []).map(normalizeFareOffer),
  };
}

function normalizeConfirmation(data: Partial<BookingConfirmation>): BookingConfirmation {
  return {
    pnr: data.pnr ?? '',
    bookingReference: data.bookingReference ?? '',
    status: data.status || 'CONFIRMED',
    totalPaidMinor: data.totalPaidMinor ?? 0,
    totalPaidFormatted: data.totalPaidFormatted ?? '',
    currency: data.currency || DEFAULT_CURRENCY,
    createdAt: data.createdAt ?? '',
  };
}

interface RawChatResponse {
  text?: string;
  uiType?: string | null;
  uiData?: unknown;
  suggestions?: unknown;
  detectedLanguage?: string | null;
}

function normalizeChatResponse(data: RawChatResponse): ChatResponse {
  let uiData: string | undefined;
  if (typeof data.uiData === 'string') {
    uiData = data.uiData;
  } else if (data.uiData !== null && data.uiData !== undefined) {
    uiData = JSON.stringify(data.uiData);
  }

  return {
    text: data.text ?? '',
    uiType: isChatUiType(data.uiType) ? data.uiType : undefined,
    uiData,
    suggestions: Array.isArray(data.suggestions)
      ? data.suggestions.filter((s): s is string => typeof s === 'string')
      : [],
    detectedLanguage: data.detectedLanguage ?? undefined,
  };
}

// =============================================================================
// Config API
// =============================================================================

export const configApi = {
  /**
   * Get all stations served by the airline
   */
  async getStations(): Promise<Station[]> {
    try {
      const response = await client.get<Station[] | null>(API_ROUTES.STATIONS);
      return response.data ?? [];
    } catch (error) {
      handleError(error);
    }
  },

  /**
   * Get the origin -> destinations route map
   */
  async getRoutes(): Promise<RouteMap> {
    try {
      const response = await client.get<Partial<RouteMap> | null>(API_ROUTES.ROUTES);
      return { routes: response.data?.routes ?? {} };
    } catch (error) {
      handleError(error);
    }
  },
};

// =============================================================================
// Search API
// =============================================================================

export const searchApi = {
  async searchFlights(request: FlightSearchRequest): Promise<FlightSearchResponse> {
    try {
      const response = await client.post<{ flights?: RawFlight[] | null; searchId?: string }>(
        API_ROUTES.SEARCH,
        request
      );
      return {
        flights: (response.data.flights ?? []).map(normalizeFlight),
        searchId: response.data.searchId ?? '',
      };
    } catch (error) {
      handleError(error);
    }
  },
};

// =============================================================================
// Booking API
// =============================================================================

export const bookingApi = {
  /**
   * Create a booking and charge the card
   */
  async create(request: BookingRequest): Promise<BookingConfirmation> {
    try {
      const response = await client.post<Partial<BookingConfirmation>>(
        API_ROUTES.BOOKING,
        request
      );
      return normalizeConfirmation(response.data);
    } catch (error) {
      handleError(error);
    }
  },

  /**
   * Retrieve a booking by its 6-character PNR
   */
  async getByPnr(pnr: string): Promise<BookingConfirmation> {
    try {
      const response = await client.get<Partial<BookingConfirmation>>(
        API_ROUTES.bookingByPnr(pnr)
      );
      return normalizeConfirmation(response.data);
    } catch (error) {
      handleError(error);
    }
  },
};

// =============================================================================
// Chat API
// =============================================================================

export const chatApi = {
  async sendMessage(request: ChatRequest): Promise<ChatResponse> {
    try {
      const response = await client.post<RawChatResponse>(API_ROUTES.CHAT_MESSAGE, request);
      return normalizeChatResponse(response.data);
    } catch (error) {
      handleError(error);
    }
  },

  async clearSession(sessionId: string): Promise<void> {
    try {
      await client.delete(API_ROUTES.chatSession(sessionId));
    } catch (error) {
      handleError(error);
    }
  },
};

// =============================================================================
// Health Check
// =============================================================================

export const healthApi = {
  async check(): Promise<{ status: string }> {
    try {
      const response = await client.get<{ status: string }>(API_ROUTES.HEALTH);
      return response.data;
    } catch (error) {
      handleError(error);
    }
  },
};

export default {
  config: configApi,
  search: searchApi,
  booking: bookingApi,
  chat: chatApi,
  health: healthApi,
};
