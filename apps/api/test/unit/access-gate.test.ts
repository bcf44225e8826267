import { describe, it, expect } from 'vitest';
import { Role } from '@medclaims/shared/constants/iam.constants.js';
import { ReviewType } from '@medclaims/shared/constants/claim.constants.js';
import {
  assertOwnerAccess,
  isOwnerScoped,
  policyholderScope,
  reviewTypeScope,
} from '../../src/lib/access-gate.js';
import { ForbiddenError } from '../../src/lib/errors.js';

const HOLDER_ID = '00000000-0000-0000-0000-000000000001';
const OTHER_HOLDER_ID = '00000000-0000-0000-0000-000000000002';
const STAFF_ID = '00000000-0000-0000-0000-000000000003';

describe('policyholder scoping', () => {
  it('only scopes POLICYHOLDER principals', () => {
    expect(isOwnerScoped({ userId: HOLDER_ID, role: Role.POLICYHOLDER })).toBe(true);
    expect(isOwnerScoped({ userId: STAFF_ID, role: Role.ADMIN })).toBe(false);
    expect(isOwnerScoped({ userId: STAFF_ID, role: Role.CLAIMS })).toBe(false);
  });

  it('pushes the principal id into list filters for a policyholder', () => {
    expect(policyholderScope({ userId: HOLDER_ID, role: Role.POLICYHOLDER })).toBe(HOLDER_ID);
    expect(policyholderScope({ userId: STAFF_ID, role: Role.FINANCE })).toBeUndefined();
  });

  it('lets a policyholder reach their own records', () => {
    expect(() =>
      assertOwnerAccess({ userId: HOLDER_ID, role: Role.POLICYHOLDER }, HOLDER_ID),
    ).not.toThrow();
  });

  it('forbids a policyholder from reaching another holder\'s records', () => {
    expect(() =>
      assertOwnerAccess({ userId: HOLDER_ID, role: Role.POLICYHOLDER }, OTHER_HOLDER_ID),
    ).toThrow(ForbiddenError);
  });

  it('does not restrict staff or ADMIN', () => {
    expect(() =>
      assertOwnerAccess({ userId: STAFF_ID, role: Role.ADMIN }, OTHER_HOLDER_ID),
    ).not.toThrow();
    expect(() =>
      assertOwnerAccess({ userId: STAFF_ID, role: Role.CUSTOMER_SERVICE }, OTHER_HOLDER_ID),
    ).not.toThrow();
  });
});

describe('reviewTypeScope', () => {
  it('limits reviewers to their own review type', () => {
    expect(reviewTypeScope({ userId: STAFF_ID, role: Role.CUSTOMER_SERVICE })).toBe(
      ReviewType.CUSTOMER_SERVICE,
    );
    expect(reviewTypeScope({ userId: STAFF_ID, role: Role.CLAIMS })).toBe(ReviewType.CLAIMS);
    expect(reviewTypeScope({ userId: STAFF_ID, role: Role.MD })).toBe(ReviewType.MD);
  });

  it('leaves ADMIN and non-reviewer roles unrestricted', () => {
    expect(reviewTypeScope({ userId: STAFF_ID, role: Role.ADMIN })).toBeUndefined();
    expect(reviewTypeScope({ userId: HOLDER_ID, role: Role.POLICYHOLDER })).toBeUndefined();
  });
});
