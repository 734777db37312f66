export const Seeds = {
  ReserveCustody: 'plstr:v1:reserve_custody',
  ClaimCustody: 'plstr:v1:claim_custody'
} as const;
