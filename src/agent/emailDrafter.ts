/**
 * Dispute Email Drafter
 *
 * Builds a plain-text email draft from a pair's facts. The tone follows the
 * verdict: mismatches put payment on hold, partial matches ask for review,
 * anything else is an informational clarification request.
 *
 * Drafts are never sent from here; they wait behind the approval checkpoint.
 */

import { env } from '../config';
import { MATERIAL_AMOUNT_DELTA, TIMING_CONCERN_DAYS } from '../matching/constants';
import type { MatchFacts, MatchStatus } from '../matching';

export interface ContactDetails {
  email: string;
  phone: string;
  companyName: string;
}

interface Tone {
  subjectPrefix: string;
  opening: string;
  action: string;
}

const TONES: Record<MatchStatus, Tone> = {
  mismatch: {
    subjectPrefix: 'URGENT: Invoice Discrepancy',
    opening: 'We have identified significant discrepancies that require immediate attention:',
    action:
      'Please provide corrected documentation or explanation within 5 business days. Payment is currently on hold.',
  },
  partial: {
    subjectPrefix: 'Review Required',
    opening: 'We are reviewing your invoice and need clarification on the following items:',
    action: 'Please review and provide supporting documentation or confirmation within 7 business days.',
  },
  match: {
    subjectPrefix: 'Clarification Requested',
    opening: 'We are processing your invoice and would appreciate clarification on minor items:',
    action:
      'Please provide any additional documentation at your convenience. This will not delay payment processing.',
  },
};

export const FALLBACK_BULLET = '• General compliance review as part of our standard process';

export const defaultContactDetails = (): ContactDetails => ({
  email: env.AP_CONTACT_EMAIL,
  phone: env.AP_CONTACT_PHONE,
  companyName: env.COMPANY_NAME,
});

export function issueBullets(facts: MatchFacts): string[] {
  const bullets: string[] = [];

  if (facts.poMissing) {
    bullets.push('• PO reference could not be located in our system');
  }
  if (!facts.vendorMatch) {
    bullets.push('• Vendor information does not match our PO records');
  }
  if (facts.amountDelta > MATERIAL_AMOUNT_DELTA) {
    bullets.push(`• Amount discrepancy of $${facts.amountDelta.toFixed(2)} detected`);
  }
  if (!facts.hasGrn) {
    bullets.push('• No goods receipt (GRN) found for the referenced PO');
  }

  const days = Math.abs(facts.daysDelta);
  if (days > TIMING_CONCERN_DAYS) {
    bullets.push(`• Timing discrepancy: Invoice dated ${days} days from the PO date`);
  }

  return bullets;
}

/**
 * @example
 * draftDisputeEmail('Acme Supplies Ltd', 'INV0012', 'PO0012', facts, 'mismatch')
 * // 'Subject: URGENT: Invoice Discrepancy - Invoice INV0012 / PO PO0012\n\nDear Acme Supplies Ltd,\n...'
 */
export function draftDisputeEmail(
  vendorName: string,
  invoiceId: string,
  poNumber: string,
  facts: MatchFacts,
  status: MatchStatus,
  contact: ContactDetails = defaultContactDetails()
): string {
  const tone = TONES[status];
  const bullets = issueBullets(facts);
  const issuesText = bullets.length > 0 ? bullets.join('\n') : FALLBACK_BULLET;

  return [
    `Subject: ${tone.subjectPrefix} - Invoice ${invoiceId} / PO ${poNumber}`,
    '',
    `Dear ${vendorName},`,
    '',
    tone.opening,
    '',
    issuesText,
    '',
    'Invoice Details:',
    `- Invoice ID: ${invoiceId}`,
    `- PO Number: ${poNumber}`,
    `- Amount Delta: $${facts.amountDelta.toFixed(2)}`,
    `- Vendor Match: ${facts.vendorMatch ? 'Yes' : 'No'}`,
    `- GRN Available: ${facts.hasGrn ? 'Yes' : 'No'}`,
    `- PO Status: ${facts.poMissing ? 'Missing' : 'Found'}`,
    '',
    tone.action,
    '',
    `If you have any questions, please contact our Accounts Payable team at ${contact.email} or call ${contact.phone}.`,
    '',
    'Best regards,',
    'Accounts Payable Department',
    contact.companyName,
    '',
  ].join('\n');
}

export default draftDisputeEmail;
