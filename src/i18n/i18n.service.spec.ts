import { I18nService } from './i18n.service';

describe('I18nService', () => {
  const i18n = new I18nService();

  it('interpolates variables', () => {
    expect(i18n.t('batch.quantity_underflow', 'en', { batchId: 'b1', quantity: 2, amount: 5 })).toBe(
      'Batch b1 holds 2, cannot remove 5',
    );
  });

  it('blanks a variable that was not given', () => {
    expect(i18n.t('batch.not_found', 'en', {})).toBe('Batch  was not found');
  });

  it('returns the template untouched without variables', () => {
    expect(i18n.t('batch.not_found')).toBe('Batch {{id}} was not found');
  });

  it('returns the key for an unknown or partial path', () => {
    expect(i18n.t('batch.nope')).toBe('batch.nope');
    expect(i18n.t('batch')).toBe('batch');
  });
});
