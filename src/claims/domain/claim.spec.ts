import { ClaimStatus, isTerminal, parseClaimStatus, statusName } from './claim';

describe('claim status', () => {
  it('parses symbolic names and numeric codes', () => {
    expect(parseClaimStatus('Submitted')).toBe(ClaimStatus.Submitted);
    expect(parseClaimStatus('Approved')).toBe(ClaimStatus.Approved);
    expect(parseClaimStatus('Rejected')).toBe(ClaimStatus.Rejected);
    expect(parseClaimStatus(1)).toBe(ClaimStatus.Approved);
    expect(parseClaimStatus('2')).toBe(ClaimStatus.Rejected);
  });

  it('rejects values outside the defined set', () => {
    expect(parseClaimStatus('approved')).toBeNull();
    expect(parseClaimStatus('Paid')).toBeNull();
    expect(parseClaimStatus(3)).toBeNull();
    expect(parseClaimStatus(1.5)).toBeNull();
    expect(parseClaimStatus('-1')).toBeNull();
    expect(parseClaimStatus('01')).toBeNull();
    expect(parseClaimStatus('0002')).toBeNull();
    expect(parseClaimStatus('0')).toBe(ClaimStatus.Submitted);
    expect(parseClaimStatus(null)).toBeNull();
    expect(parseClaimStatus({ status: 1 })).toBeNull();
  });

  it('names unknown codes Unknown', () => {
    expect(statusName(ClaimStatus.Approved)).toBe('Approved');
    expect(statusName(7)).toBe('Unknown');
  });

  it('treats Approved and Rejected as terminal', () => {
    expect(isTerminal(ClaimStatus.Submitted)).toBe(false);
    expect(isTerminal(ClaimStatus.Approved)).toBe(true);
    expect(isTerminal(ClaimStatus.Rejected)).toBe(true);
  });
});
