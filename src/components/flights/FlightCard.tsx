/**
 * Flight Card Component
 * One search result; expands to show fare families
 */

import { useTranslation } from 'react-i18next';
import type { Flight } from '../../types';
import {
  flightDuration,
  formatFlightTime,
  lowestFare,
  toFareOptions,
} from '../../utils/fares';

interface FlightCardProps {
  flight: Flight;
  isExpanded: boolean;
  /** Fare code chosen on this flight, if any */
  selectedFare: string | null;
  onToggle: () => void;
  onSelectFare: (fareCode: string) => void;
}

export default function FlightCard({
  flight,
  isExpanded,
  selectedFare,
  onToggle,
  onSelectFare,
}: FlightCardProps) {
  const { t } = useTranslation();
  const cheapest = lowestFare(flight);

  return (
    <article className={`flight-card ${selectedFare ? 'flight-card--selected' : ''}`}>
      <button
        type="button"
        className="flight-card__summary"
        onClick={onToggle}
        aria-expanded={isExpanded}
        aria-label={`${flight.flightNumber} ${isExpanded ? t('results.hideFares') : t('results.showFares')}`}
      >
        <div className="flight-card__times">
          <span className="flight-card__time">{formatFlightTime(flight.departureTime)}</span>
          <span className="flight-card__duration">{flightDuration(flight)}</span>
          <span className="flight-card__time">{formatFlightTime(flight.arrivalTime)}</span>
        </div>
        <div className="flight-card__meta">
          <span className="flight-card__number">{flight.flightNumber}</span>
          {flight.aircraft && <span className="flight-card__aircraft">{flight.aircraft}</span>}
        </div>
        {cheapest && (
          <div className="flight-card__price">
            <small>{t('results.from')}</small> {cheapest.priceFormatted}
          </div>
        )}
      </button>

      {isExpanded && (
        <ul className="fare-options">
          {toFareOptions(flight).map((option) => {
            const isSelected = option.code === selectedFare;
            return (
              <li
                key={option.code}
                className={`fare-option fare-option--${option.family.toLowerCase()}`}
              >
                <h4 className="fare-option__name">{option.displayName}</h4>
                <p className="fare-option__price">{option.priceFormatted}</p>
                <ul className="fare-option__inclusions">
                  {option.inclusions.map((inclusion) => (
                    <li key={inclusion}>{inclusion}</li>
                  ))}
                </ul>
                <button
                  type="button"
                  className={isSelected ? 'primary-btn' : 'secondary-btn'}
                  onClick={() => onSelectFare(option.code)}
                  aria-pressed={isSelected}
                >
                  {isSelected ? t('results.selected') : t('results.selectFare', { fare: option.displayName })}
                </button>
              </li>
            );
          })}
        </ul>
      )}
    </article>
  );
}
