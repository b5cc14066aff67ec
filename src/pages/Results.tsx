/**
 * Results Page
 * Flights for the chosen day; pick a flight and fare family
 */

import { useState } from 'react';
import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { StepIndicator } from '../components/booking';
import FlightCard from '../components/flights/FlightCard';
import { useBooking } from '../context/BookingContext';
import type { Flight } from '../types';

export default function Results() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const { searchCriteria, searchResult, selectedFlight, selectFlight } = useBooking();

  const [expandedFlight, setExpandedFlight] = useState<string | null>(
    selectedFlight?.flight.flightNumber ?? null
  );

  const flights = searchResult?.flights ?? [];

  const toggle = (flightNumber: string) => {
    setExpandedFlight((prev) => (prev === flightNumber ? null : flightNumber));
  };

  const handleSelectFare = (flight: Flight, fareCode: string) => {
    selectFlight(flight, fareCode);
  };

  return (
    <div className="results-page">
      <StepIndicator current="results" />

      <header className="page-header">
        <button className="back-btn icon-btn" onClick={() => navigate('/')} aria-label={t('common.back')}>
          ←
        </button>
        <div>
          <h1>{t('results.title')}</h1>
          {searchCriteria && (
            <p className="route-summary">
              {searchCriteria.origin.code} → {searchCriteria.destination.code} ·{' '}
              {searchCriteria.departureDate}
            </p>
          )}
        </div>
      </header>

      {flights.length === 0 ? (
        <div className="empty-state glass-card">
          <p>{t('results.noFlights')}</p>
          <button className="secondary-btn" onClick={() => navigate('/')}>
            {t('results.modifySearch')}
          </button>
        </div>
      ) : (
        <>
          <p className="results-count">{t('results.flightsFound', { count: flights.length })}</p>
          <div className="flight-list">
            {flights.map((flight) => (
              <FlightCard
                key={flight.flightNumber}
                flight={flight}
                isExpanded={expandedFlight === flight.flightNumber}
                selectedFare={
                  selectedFlight?.flight.flightNumber === flight.flightNumber
                    ? selectedFlight.fareFamily
                    : null
                }
                onToggle={() => toggle(flight.flightNumber)}
                onSelectFare={(code) => handleSelectFare(flight, code)}
              />
            ))}
          </div>
        </>
      )}

      {selectedFlight && (
        <footer className="sticky-footer">
          <span className="sticky-footer__summary">
            {selectedFlight.flight.flightNumber} · {selectedFlight.priceFormatted}
          </span>
          <button className="primary-btn" onClick={() => navigate('/passengers')}>
            {t('results.continue')}
          </button>
        </footer>
      )}
    </div>
  );
}
