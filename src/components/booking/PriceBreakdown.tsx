/**
 * Price Breakdown
 * Fare, extras and grand total in one card
 */

import { useTranslation } from 'react-i18next';
import { formatMoney } from '../../utils/money';

interface PriceBreakdownProps {
  fareTotalMinor: number;
  ancillariesTotalMinor: number;
  currency: string;
}

export default function PriceBreakdown({
  fareTotalMinor,
  ancillariesTotalMinor,
  currency,
}: PriceBreakdownProps) {
  const { t } = useTranslation();

  return (
    <dl className="price-breakdown">
      <div className="price-breakdown__row">
        <dt>{t('ancillaries.fareTotal')}</dt>
        <dd>{formatMoney(fareTotalMinor, currency)}</dd>
      </div>
      <div className="price-breakdown__row">
        <dt>{t('ancillaries.extrasTotal')}</dt>
        <dd>{formatMoney(ancillariesTotalMinor, currency)}</dd>
      </div>
      <div className="price-breakdown__row price-breakdown__row--total">
        <dt>{t('ancillaries.grandTotal')}</dt>
        <dd data-testid="grand-total">{formatMoney(fareTotalMinor + ancillariesTotalMinor, currency)}</dd>
      </div>
    </dl>
  );
}
