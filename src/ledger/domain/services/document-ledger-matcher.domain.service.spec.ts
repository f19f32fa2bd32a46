import { DocumentLedgerMatcher } from './document-ledger-matcher.domain.service';
import { LedgerDocumentView } from '../entities/ledger-document-view.entity';

const ledgerDoc = (
  docId: string,
  filePath: string,
  title = '',
): LedgerDocumentView => ({
  docId,
  title,
  issuingEntity: 'Registry',
  status: 'Registered',
  createdAt: '2025-01-20T10:30:00Z',
  sizeBytes: 2048,
  filePath,
});

describe('DocumentLedgerMatcher', () => {
  const matcher = new DocumentLedgerMatcher();

  describe('path matching', () => {
    it('should match an identical path', () => {
      const doc = ledgerDoc('d1', 'CC/1001/cedula_v2.pdf');

      expect(
        matcher.findMatch([doc], { title: null }, { storagePath: 'CC/1001/cedula_v2.pdf' }),
      ).toBe(doc);
    });

    it('should match a ledger path that ends with the local path', () => {
      const doc = ledgerDoc('d1', '/var/storage/CC/1001/cedula_v2.pdf');

      expect(
        matcher.findMatch([doc], { title: null }, { storagePath: 'CC/1001/cedula_v2.pdf' }),
      ).toBe(doc);
    });

    it('should normalize backslashes and surrounding spaces on both sides', () => {
      const doc = ledgerDoc('d1', ' C:\\storage\\CC\\1001\\cedula_v2.pdf ');

      expect(
        matcher.findMatch([doc], { title: null }, { storagePath: '  CC\\1001/cedula_v2.pdf' }),
      ).toBe(doc);
    });

    it('should not match different files', () => {
      expect(
        matcher.findMatch(
          [ledgerDoc('d1', 'CC/1001/diploma.pdf')],
          { title: null },
          { storagePath: 'CC/1001/cedula_v2.pdf' },
        ),
      ).toBeNull();
    });

    it('should never match on blank paths', () => {
      expect(
        matcher.findMatch([ledgerDoc('d1', '   ')], { title: null }, { storagePath: '' }),
      ).toBeNull();
      expect(
        matcher.findMatch([ledgerDoc('d1', '')], { title: null }, { storagePath: 'a.pdf' }),
      ).toBeNull();
      expect(
        matcher.findMatch([ledgerDoc('d1', 'a.pdf')], { title: null }, null),
      ).toBeNull();
    });

    it('should return the first path match in ledger order', () => {
      const first = ledgerDoc('d1', '/a/CC/1001/cedula.pdf');
      const second = ledgerDoc('d2', '/b/CC/1001/cedula.pdf');

      expect(
        matcher.findMatch([first, second], { title: null }, { storagePath: 'CC/1001/cedula.pdf' }),
      ).toBe(first);
    });
  });

  describe('title fallback', () => {
    it('should match titles case-insensitively after trimming', () => {
      const doc = ledgerDoc('d1', 'elsewhere/other.pdf', '  CÉDULA DE CIUDADANÍA ');

      expect(
        matcher.findMatch(
          [doc],
          { title: 'cédula de ciudadanía' },
          { storagePath: 'CC/1001/cedula_v2.pdf' },
        ),
      ).toBe(doc);
    });

    it('should prefer a path match anywhere over an earlier title match', () => {
      const byTitle = ledgerDoc('d1', 'old/other.pdf', 'Diploma');
      const byPath = ledgerDoc('d2', '/store/CC/1001/diploma_v3.pdf', 'Something else');

      expect(
        matcher.findMatch(
          [byTitle, byPath],
          { title: 'Diploma' },
          { storagePath: 'CC/1001/diploma_v3.pdf' },
        ),
      ).toBe(byPath);
    });

    it('should never match blank titles', () => {
      expect(
        matcher.findMatch([ledgerDoc('d1', 'x.pdf', '')], { title: '  ' }, null),
      ).toBeNull();
      expect(
        matcher.findMatch([ledgerDoc('d1', 'x.pdf', '  ')], { title: null }, null),
      ).toBeNull();
    });
  });

  it('should skip missing entries and return null for an empty list', () => {
    expect(
      matcher.findMatch([], { title: 'Diploma' }, { storagePath: 'a.pdf' }),
    ).toBeNull();

    const doc = ledgerDoc('d1', 'a.pdf');
    expect(
      matcher.findMatch([null, undefined, doc], { title: null }, { storagePath: 'a.pdf' }),
    ).toBe(doc);
  });
});
