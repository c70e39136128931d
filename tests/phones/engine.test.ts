import { describe, it, expect } from 'vitest';
import { PhoneCleaner } from '../../src/phones/engine.js';
import type { ContactRecord } from '../../src/types/contact.js';

function contact(name: string, ...phones: Array<string | [string, string]>): ContactRecord {
  return {
    name,
    phones: phones.map(p => (typeof p === 'string' ? { value: p } : { value: p[0], label: p[1] })),
  };
}

describe('PhoneCleaner', () => {
  it('should clean an unlabelled formatted US number', () => {
    const result = new PhoneCleaner().cleanBatch([contact('Ana', '(214) 555-1212')]);

    expect(result.rows).toEqual([
      { Name: 'Ana', Phone_E164: '+12145551212', Country: 'US', Channel: 'WhatsApp', OptIn: '' },
    ]);
  });

  it('should apply the Mexico policy per cleaner', () => {
    const plain = new PhoneCleaner();
    const mobile = new PhoneCleaner({ mexicoMobileDisambiguatorEnabled: true });
    const records = [contact('Beto', '52 55 1234 5678')];

    expect(plain.cleanBatch(records).rows[0]).toMatchObject({ Phone_E164: '+525512345678', Country: 'MX' });
    expect(mobile.cleanBatch(records).rows[0]).toMatchObject({ Phone_E164: '+5215512345678', Country: 'MX' });
  });

  it('should keep the first record for a repeated number', () => {
    const records: ContactRecord[] = [
      { name: 'Ana', phones: [{ value: '214-555-1212' }], channel: 'SMS', optIn: 'yes' },
      { name: 'Ana Again', phones: [{ value: '+1 214 555 1212' }], channel: 'WhatsApp', optIn: 'no' },
    ];

    const result = new PhoneCleaner().cleanBatch(records);

    expect(result.rows).toEqual([
      { Name: 'Ana', Phone_E164: '+12145551212', Country: 'US', Channel: 'SMS', OptIn: 'yes' },
    ]);
    expect(result.duplicates).toBe(1);
  });

  it('should report contacts without a usable number', () => {
    const missing = contact('Nadie', 'N/A', '');
    const result = new PhoneCleaner().cleanBatch([missing, contact('Eva', ['8175551234', 'Cell'])]);

    expect(result.unresolved).toEqual([missing]);
    expect(result.rows.map(r => r.Name)).toEqual(['Eva']);
  });

  it('should select the mobile field of a multi-phone contact', () => {
    const result = new PhoneCleaner().cleanBatch([
      contact('Luis', ['2145551212', 'Home'], ['+52 81 1234 5678', 'Mobile']),
    ]);

    expect(result.rows[0]).toMatchObject({ Phone_E164: '+528112345678', Country: 'MX' });
  });

  it('should start every batch with an empty seen-set', () => {
    const cleaner = new PhoneCleaner();
    const records = [contact('Ana', '2145551212')];

    expect(cleaner.cleanBatch(records).rows).toHaveLength(1);
    expect(cleaner.cleanBatch(records).rows).toHaveLength(1);
  });

  it('should fill Channel and OptIn from the caller when records carry none', () => {
    const result = new PhoneCleaner().cleanBatch(
      [contact('Ana', '2145551212'), { ...contact('Bob', '8175551234'), channel: 'WhatsApp' }],
      { channel: 'SMS', optIn: 'pending' },
    );

    expect(result.rows.map(r => [r.Channel, r.OptIn])).toEqual([
      ['SMS', 'pending'],
      ['WhatsApp', 'pending'],
    ]);
  });

  it('should resolve bare 10-digit numbers with the configured country code', () => {
    const cleaner = new PhoneCleaner({ defaultCountryCode: '+52' });

    expect(cleaner.resolveField('5512345678')).toEqual([{ phone: '+525512345678', country: 'MX' }]);
  });

  it('should reject a malformed default country code', () => {
    expect(() => new PhoneCleaner({ defaultCountryCode: '1' })).toThrow();
  });

  it('should explain a field', () => {
    const inspection = new PhoneCleaner().inspectField('2145551212 / N/A', 'Mobile');

    expect(inspection.mobileLabel).toBe(true);
    expect(inspection.tokens).toEqual(['2145551212 / ', 'N/', 'A']);
    expect(inspection.candidates).toEqual([
      { digits: '2145551212', international: false },
      { digits: '12145551212', international: true, normalized: '+12145551212' },
    ]);
    expect(inspection.numbers.map(n => n.phone)).toEqual(['+12145551212']);
  });
});
