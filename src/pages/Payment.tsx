/**
 * Payment Page
 * Card details and the final booking request
 */

import type { FormEvent } from 'react';
import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { PriceBreakdown, StepIndicator } from '../components/booking';
import { ErrorBanner } from '../components/ui';
import { useBooking } from '../context/BookingContext';
import { usePayment } from '../hooks/usePayment';
import { formatMoney } from '../utils/money';

export default function Payment() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const { priceSummary } = useBooking();
  const payment = usePayment();

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    const booked = await payment.submit();
    if (booked) navigate('/confirmation');
  };

  const fieldError = (message: string | undefined) =>
    message ? (
      <small className="field-error" role="alert">
        {message}
      </small>
    ) : null;

  return (
    <div className="payment-page">
      <StepIndicator current="payment" />

      <header className="page-header">
        <button className="back-btn icon-btn" onClick={() => navigate('/ancillaries')} aria-label={t('common.back')}>
          ←
        </button>
        <h1>{t('payment.title')}</h1>
      </header>

      {payment.error && <ErrorBanner message={payment.error} />}

      {priceSummary && (
        <PriceBreakdown
          fareTotalMinor={priceSummary.fareTotalMinor}
          ancillariesTotalMinor={priceSummary.ancillariesTotalMinor}
          currency={priceSummary.currency}
        />
      )}

      <form className="payment-form glass-card" onSubmit={(e) => void handleSubmit(e)} noValidate>
        <label className="field">
          <span>{t('payment.cardholderName')}</span>
          <input
            name="cardholderName"
            autoComplete="cc-name"
            value={payment.form.cardholderName}
            onChange={(e) => payment.setCardholderName(e.target.value)}
          />
          {fieldError(payment.fieldErrors.cardholderName)}
        </label>

        <label className="field">
          <span>{t('payment.cardNumber')}</span>
          <input
            name="cardNumber"
            inputMode="numeric"
            autoComplete="cc-number"
            value={payment.displayCardNumber}
            onChange={(e) => payment.setCardNumber(e.target.value)}
          />
          {payment.cardType !== 'UNKNOWN' && (
            <span className="card-brand">{payment.cardType}</span>
          )}
          {fieldError(payment.fieldErrors.cardNumber)}
        </label>

        <div className="field-row">
          <label className="field">
            <span>{t('payment.expiry')}</span>
            <input
              name="expiryDate"
              inputMode="numeric"
              autoComplete="cc-exp"
              value={payment.displayExpiry}
              onChange={(e) => payment.setExpiryDate(e.target.value)}
            />
            {fieldError(payment.fieldErrors.expiryDate)}
          </label>

          <label className="field">
            <span>{t('payment.cvv')}</span>
            <input
              name="cvv"
              type="password"
              inputMode="numeric"
              autoComplete="cc-csc"
              value={payment.form.cvv}
              onChange={(e) => payment.setCvv(e.target.value)}
            />
            {fieldError(payment.fieldErrors.cvv)}
          </label>
        </div>

        <button type="submit" className="primary-btn" disabled={payment.isProcessing}>
          {payment.isProcessing
            ? t('payment.processing')
            : t('payment.pay', { amount: formatMoney(payment.totalMinor, payment.currency) })}
        </button>
      </form>
    </div>
  );
}
