/**
 * Ancillaries Page
 * Optional extras per passenger before payment
 */

import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { PriceBreakdown, StepIndicator } from '../components/booking';
import { ErrorBanner } from '../components/ui';
import { useAncillaries } from '../hooks/useAncillaries';
import {
  BAGGAGE_OPTIONS,
  MEAL_OPTIONS,
  PRIORITY_BOARDING_PRICE_MINOR,
} from '../utils/ancillaries';
import { formatMoney } from '../utils/money';

export default function Ancillaries() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const extras = useAncillaries();

  const handleContinue = () => {
    if (extras.confirm()) navigate('/payment');
  };

  return (
    <div className="ancillaries-page">
      <StepIndicator current="ancillaries" />

      <header className="page-header">
        <button className="back-btn icon-btn" onClick={() => navigate('/passengers')} aria-label={t('common.back')}>
          ←
        </button>
        <h1>{t('ancillaries.title')}</h1>
      </header>

      {extras.error && <ErrorBanner message={extras.error} />}

      {extras.passengers.map((passenger) => (
        <section key={passenger.id} className="ancillary-passenger glass-card">
          <h2>
            {passenger.firstName} {passenger.lastName}
          </h2>

          {passenger.type !== 'INFANT' && (
            <label className="field">
              <span>{t('ancillaries.baggage')}</span>
              <select
                value={extras.selection.baggage[passenger.id] ?? 0}
                onChange={(e) => extras.selectBaggage(passenger.id, Number(e.target.value))}
              >
                {BAGGAGE_OPTIONS.map((option) => (
                  <option key={option.weight} value={option.weight}>
                    {option.label}
                    {option.priceMinor > 0 ? ` (+${formatMoney(option.priceMinor, extras.currency)})` : ''}
                  </option>
                ))}
              </select>
            </label>
          )}

          <label className="field">
            <span>{t('ancillaries.meals')}</span>
            <select
              value={extras.selection.meals[passenger.id] ?? 'NONE'}
              onChange={(e) => extras.selectMeal(passenger.id, e.target.value)}
            >
              {MEAL_OPTIONS.map((option) => (
                <option key={option.code} value={option.code}>
                  {option.name}
                  {option.priceMinor > 0 ? ` (+${formatMoney(option.priceMinor, extras.currency)})` : ''}
                </option>
              ))}
            </select>
          </label>
        </section>
      ))}

      <section className="glass-card toggle-setting">
        <label className="toggle-content">
          <div>
            <span className="toggle-title">{t('ancillaries.priority')}</span>
            <span className="toggle-description">
              {t('ancillaries.priorityHint')} · {formatMoney(PRIORITY_BOARDING_PRICE_MINOR, extras.currency)}
            </span>
          </div>
          <input
            type="checkbox"
            checked={extras.selection.priorityBoarding}
            onChange={extras.togglePriorityBoarding}
          />
        </label>
      </section>

      <PriceBreakdown
        fareTotalMinor={extras.fareTotalMinor}
        ancillariesTotalMinor={extras.ancillariesTotalMinor}
        currency={extras.currency}
      />

      <button className="primary-btn" onClick={handleContinue}>
        {t('ancillaries.continue')}
      </button>
    </div>
  );
}
