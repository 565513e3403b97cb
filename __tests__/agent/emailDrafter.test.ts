import { draftDisputeEmail, issueBullets, defaultContactDetails, FALLBACK_BULLET } from '../../src/agent/emailDrafter';
import { cleanFacts } from '../helpers';

const contact = { email: 'ap@example.com', phone: '555-0100', companyName: 'Example Corp' };

describe('Dispute Email Drafter', () => {
  describe('issueBullets', () => {
    it('should list every issue in order', () => {
      expect(
        issueBullets({ amountDelta: 12.5, vendorMatch: false, poMissing: true, hasGrn: false, daysDelta: 31 })
      ).toEqual([
        '• PO reference could not be located in our system',
        '• Vendor information does not match our PO records',
        '• Amount discrepancy of $12.50 detected',
        '• No goods receipt (GRN) found for the referenced PO',
        '• Timing discrepancy: Invoice dated 31 days from the PO date',
      ]);
    });

    it('should return nothing for clean facts', () => {
      expect(issueBullets(cleanFacts())).toEqual([]);
    });
  });

  describe('draftDisputeEmail', () => {
    it('should draft an urgent email for a mismatch', () => {
      const email = draftDisputeEmail(
        'Globex Inc',
        'INV0002',
        'PO0002',
        { amountDelta: 200, vendorMatch: false, poMissing: false, hasGrn: false, daysDelta: 55 },
        'mismatch',
        contact
      );

      expect(email).toBe(
        [
          'Subject: URGENT: Invoice Discrepancy - Invoice INV0002 / PO PO0002',
          '',
          'Dear Globex Inc,',
          '',
          'We have identified significant discrepancies that require immediate attention:',
          '',
          '• Vendor information does not match our PO records',
          '• Amount discrepancy of $200.00 detected',
          '• No goods receipt (GRN) found for the referenced PO',
          '• Timing discrepancy: Invoice dated 55 days from the PO date',
          '',
          'Invoice Details:',
          '- Invoice ID: INV0002',
          '- PO Number: PO0002',
          '- Amount Delta: $200.00',
          '- Vendor Match: No',
          '- GRN Available: No',
          '- PO Status: Found',
          '',
          'Please provide corrected documentation or explanation within 5 business days. Payment is currently on hold.',
          '',
          'If you have any questions, please contact our Accounts Payable team at ap@example.com or call 555-0100.',
          '',
          'Best regards,',
          'Accounts Payable Department',
          'Example Corp',
          '',
        ].join('\n')
      );
    });

    it('should use the review tone and fallback bullet for a partial match', () => {
      const email = draftDisputeEmail('Acme Supplies Ltd', 'INV0009', 'PO0009', cleanFacts(), 'partial', contact);
      const lines = email.split('\n');

      expect(lines[0]).toBe('Subject: Review Required - Invoice INV0009 / PO PO0009');
      expect(lines[4]).toBe('We are reviewing your invoice and need clarification on the following items:');
      expect(lines[6]).toBe(FALLBACK_BULLET);
      expect(lines).toContain(
        'Please review and provide supporting documentation or confirmation within 7 business days.'
      );
    });

    it('should use the clarification tone for a low-confidence match', () => {
      const email = draftDisputeEmail('Acme Supplies Ltd', 'INV0001', 'PO0001', cleanFacts(), 'match', contact);

      expect(email.split('\n')[0]).toBe('Subject: Clarification Requested - Invoice INV0001 / PO PO0001');
      expect(email).toContain('This will not delay payment processing.');
    });

    it('should report a missing PO in the details', () => {
      const email = draftDisputeEmail(
        'Initech LLC',
        'INV0003',
        'PO0003',
        cleanFacts({ poMissing: true, hasGrn: false }),
        'mismatch',
        contact
      );

      expect(email.split('\n')).toContain('- PO Status: Missing');
    });

    it('should sign with the configured contact details by default', () => {
      const email = draftDisputeEmail('Acme Supplies Ltd', 'INV0001', 'PO0001', cleanFacts(), 'match');
      const { email: address, phone } = defaultContactDetails();

      expect(email).toContain(`Accounts Payable team at ${address} or call ${phone}.`);
    });
  });
});
