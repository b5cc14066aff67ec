/**
 * Passenger Counter
 * Stepper for one passenger type on the search form
 */

import { useTranslation } from 'react-i18next';

interface PassengerCounterProps {
  label: string;
  hint: string;
  value: number;
  min: number;
  onIncrement: () => void;
  onDecrement: () => void;
}

export default function PassengerCounter({
  label,
  hint,
  value,
  min,
  onIncrement,
  onDecrement,
}: PassengerCounterProps) {
  const { t } = useTranslation();

  return (
    <div className="passenger-counter">
      <div className="passenger-counter__label">
        <span>{label}</span>
        <small>{hint}</small>
      </div>
      <div className="passenger-counter__controls">
        <button
          type="button"
          className="icon-btn"
          onClick={onDecrement}
          disabled={value <= min}
          aria-label={t('search.decrease', { type: label })}
        >
          −
        </button>
        <span className="passenger-counter__value" aria-live="polite">
          {value}
        </span>
        <button
          type="button"
          className="icon-btn"
          onClick={onIncrement}
          aria-label={t('search.increase', { type: label })}
        >
          +
        </button>
      </div>
    </div>
  );
}
