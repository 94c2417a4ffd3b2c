/**
 * Tests for Tender Normalizer
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeTender,
  normalizeTenders,
  parseClosingDate,
  parseTenderDetails,
} from '../../src/collector/normalizer';
import { SCRAPED_AT, rawTender } from '../helpers/fakes';

describe('Tender Normalizer', () => {
  describe('parseTenderDetails', () => {
    it('should read labelled category and department lines', () => {
      const details = parseTenderDetails(
        'Construction of water tank\nCategory: Works\nDepartment: Public Health Engineering'
      );

      expect(details).toEqual({
        title: 'Construction of water tank',
        category: 'Works',
        department: 'Public Health Engineering',
      });
    });

    it('should accept dash separators and short labels in any order', () => {
      const details = parseTenderDetails('Road repair\nOrg - Highways\nCategory - Civil');

      expect(details).toEqual({ title: 'Road repair', category: 'Civil', department: 'Highways' });
    });

    it('should fill missing labels from unlabelled lines in order', () => {
      const details = parseTenderDetails('Supply of medicines\nGoods\nHealth Department Chakwal');

      expect(details).toEqual({
        title: 'Supply of medicines',
        category: 'Goods',
        department: 'Health Department Chakwal',
      });
    });

    it('should skip blank lines', () => {
      const details = parseTenderDetails('\n  Solar panels  \n\n  Category: Energy\n');

      expect(details).toEqual({ title: 'Solar panels', category: 'Energy', department: '' });
    });

    it('should return empty fields for empty text', () => {
      expect(parseTenderDetails('')).toEqual({ title: '', category: '', department: '' });
    });
  });

  describe('parseClosingDate', () => {
    it('should parse ISO dates with or without a time', () => {
      expect(parseClosingDate('2026-10-25')).toBe('2026-10-25');
      expect(parseClosingDate('2026-10-25T11:00')).toBe('2026-10-25');
    });

    it('should read numeric dates day first', () => {
      expect(parseClosingDate('25/10/2026 11:00 AM')).toBe('2026-10-25');
      expect(parseClosingDate('5.1.2027')).toBe('2027-01-05');
      expect(parseClosingDate('05-01-2027')).toBe('2027-01-05');
    });

    it('should parse month names in both orders', () => {
      expect(parseClosingDate('25 Oct, 2026')).toBe('2026-10-25');
      expect(parseClosingDate('25-October-2026')).toBe('2026-10-25');
      expect(parseClosingDate('October 25, 2026')).toBe('2026-10-25');
    });

    it('should return null for impossible or unknown dates', () => {
      expect(parseClosingDate('31/02/2026')).toBeNull();
      expect(parseClosingDate('25 Foo 2026')).toBeNull();
      expect(parseClosingDate('To be announced')).toBeNull();
      expect(parseClosingDate('')).toBeNull();
    });
  });

  describe('normalizeTender', () => {
    it('should trim fields, drop blank links and parse the closing date', () => {
      const record = normalizeTender(
        {
          identity: ' PHE-2026-101 ',
          title: ' Construction of water tank ',
          category: null,
          closingDate: '25/10/2026',
          links: [' https://tenders.example.gov/docs/a.pdf ', '  '],
        },
        SCRAPED_AT
      );

      expect(record).toEqual({
        identity: 'PHE-2026-101',
        title: 'Construction of water tank',
        category: '',
        department: '',
        closingDate: '25/10/2026',
        closingDateParsed: '2026-10-25',
        advertisedDate: '',
        links: ['https://tenders.example.gov/docs/a.pdf'],
        scrapedAt: SCRAPED_AT,
      });
    });

    it('should return a frozen record', () => {
      const record = normalizeTender(rawTender('T1'));

      expect(record).not.toBeNull();
      expect(Object.isFrozen(record)).toBe(true);
    });

    it('should reject a tender without an identity', () => {
      expect(normalizeTender(rawTender('   '))).toBeNull();
      expect(normalizeTender({ ...rawTender('T1'), identity: null })).toBeNull();
    });

    it('should keep the closing date text when it cannot be parsed', () => {
      const record = normalizeTender(rawTender('T1', { closingDate: 'Extended' }));

      expect(record?.closingDate).toBe('Extended');
      expect(record?.closingDateParsed).toBeNull();
    });

    it('should fall back to the run timestamp for an unreadable scrapedAt', () => {
      const record = normalizeTender(rawTender('T1', { scrapedAt: 'yesterday' }), SCRAPED_AT);

      expect(record?.scrapedAt).toBe(SCRAPED_AT);
    });
  });

  describe('normalizeTenders', () => {
    it('should count rejected tenders and preserve order', () => {
      const result = normalizeTenders([rawTender('T1'), rawTender(''), rawTender('T3')], SCRAPED_AT);

      expect(result.rejected).toBe(1);
      expect(result.records.map(record => record.identity)).toEqual(['T1', 'T3']);
    });
  });
});
