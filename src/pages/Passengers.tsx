/**
 * Passengers Page
 * Details and travel documents, one traveller at a time
 */

import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { StepIndicator } from '../components/booking';
import { ErrorBanner } from '../components/ui';
import { usePassengerForms } from '../hooks/usePassengerForms';
import type { DocumentType, PassengerField, PassengerForm } from '../types';
import { TITLE_OPTIONS } from '../utils/passengerForms';
import { PRIMARY_CONTACT_ID } from '../utils/validation';

const DOCUMENT_TYPES: { value: DocumentType; labelKey: string }[] = [
  { value: 'PASSPORT', labelKey: 'passengers.passport' },
  { value: 'NATIONAL_ID', labelKey: 'passengers.nationalId' },
  { value: 'IQAMA', labelKey: 'passengers.iqama' },
];

function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((d) => d.value === value);
}

export default function Passengers() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const {
    forms,
    currentIndex,
    currentForm,
    isFirst,
    isLast,
    error,
    updateField,
    setDocumentType,
    next,
    previous,
    submit,
    clearError,
  } = usePassengerForms();

  if (!currentForm) return null;

  const field = (name: PassengerField, labelKey: string, type = 'text') => (
    <label className="field">
      <span>{t(labelKey)}</span>
      <input
        name={name}
        type={type}
        value={currentForm[name]}
        onChange={(e) => updateField(currentForm.id, name, e.target.value)}
      />
    </label>
  );

  const handleContinue = () => {
    if (submit()) navigate('/ancillaries');
  };

  return (
    <div className="passengers-page">
      <StepIndicator current="passengers" />

      <header className="page-header">
        <button className="back-btn icon-btn" onClick={() => navigate('/results')} aria-label={t('common.back')}>
          ←
        </button>
        <div>
          <h1>{t('passengers.title')}</h1>
          <p className="progress-label">
            {t('passengers.progress', { current: currentIndex + 1, total: forms.length })}
          </p>
        </div>
      </header>

      {error && <ErrorBanner message={error} onDismiss={clearError} />}

      <form className="passenger-form glass-card" onSubmit={(e) => e.preventDefault()}>
        <h2>{currentForm.label}</h2>

        <fieldset>
          <legend>{t('passengers.personal')}</legend>
          <label className="field">
            <span>{t('passengers.titleLabel')}</span>
            <select
              name="title"
              value={currentForm.title}
              onChange={(e) => updateField(currentForm.id, 'title', e.target.value)}
            >
              <option value="" />
              {TITLE_OPTIONS[currentForm.type].map((title) => (
                <option key={title} value={title}>
                  {title}
                </option>
              ))}
            </select>
          </label>
          {field('firstName', 'passengers.firstName')}
          {field('lastName', 'passengers.lastName')}
          {field('dateOfBirth', 'passengers.dateOfBirth', 'date')}
          {field('nationality', 'passengers.nationality')}
        </fieldset>

        <fieldset>
          <legend>{t('passengers.document')}</legend>
          <label className="field">
            <span>{t('passengers.documentType')}</span>
            <select
              name="documentType"
              value={currentForm.documentType}
              onChange={(e) => {
                if (isDocumentType(e.target.value)) {
                  setDocumentType(currentForm.id, e.target.value);
                }
              }}
            >
              {DOCUMENT_TYPES.map((doc) => (
                <option key={doc.value} value={doc.value}>
                  {t(doc.labelKey)}
                </option>
              ))}
            </select>
          </label>
          {field('documentNumber', 'passengers.documentNumber')}
          {field('documentExpiry', 'passengers.documentExpiry', 'date')}
        </fieldset>

        {currentForm.id === PRIMARY_CONTACT_ID && <ContactFields form={currentForm} onChange={updateField} />}

        <div className="form-actions">
          {!isFirst && (
            <button type="button" className="secondary-btn" onClick={previous}>
              {t('passengers.previous')}
            </button>
          )}
          {isLast ? (
            <button type="button" className="primary-btn" onClick={handleContinue}>
              {t('passengers.continue')}
            </button>
          ) : (
            <button type="button" className="primary-btn" onClick={next}>
              {t('passengers.next')}
            </button>
          )}
        </div>
      </form>
    </div>
  );
}

interface ContactFieldsProps {
  form: PassengerForm;
  onChange: (id: string, field: PassengerField, value: string) => void;
}

function ContactFields({ form, onChange }: ContactFieldsProps) {
  const { t } = useTranslation();

  return (
    <fieldset>
      <legend>{t('passengers.contact')}</legend>
      <label className="field">
        <span>{t('passengers.email')}</span>
        <input
          name="email"
          type="email"
          value={form.email}
          onChange={(e) => onChange(form.id, 'email', e.target.value)}
        />
      </label>
      <label className="field">
        <span>{t('passengers.phone')}</span>
        <input
          name="phone"
          type="tel"
          value={form.phone}
          onChange={(e) => onChange(form.id, 'phone', e.target.value)}
        />
      </label>
    </fieldset>
  );
}
