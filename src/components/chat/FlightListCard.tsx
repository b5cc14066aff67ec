/**
 * Flight List Card
 * Flights offered by the assistant; tapping one asks to select it
 */

import { parseFlightList } from '../../utils/chatPayload';

interface FlightListCardProps {
  uiData?: string;
  onSelectFlight: (flightNumber: string) => void;
  disabled?: boolean;
}

export default function FlightListCard({ uiData, onSelectFlight, disabled = false }: FlightListCardProps) {
  const flights = parseFlightList(uiData);
  if (flights.length === 0) return null;

  return (
    <ul className="chat-card chat-card--flights">
      {flights.map((flight) => (
        <li key={flight.flightNumber}>
          <button
            type="button"
            className="chat-flight"
            onClick={() => onSelectFlight(flight.flightNumber)}
            disabled={disabled}
          >
            <span className="chat-flight__number">{flight.flightNumber}</span>
            <span className="chat-flight__time">
              {flight.date ? `${flight.date} · ` : ''}
              {flight.departureTime}
            </span>
            <span className="chat-flight__price">{flight.price}</span>
          </button>
        </li>
      ))}
    </ul>
  );
}
