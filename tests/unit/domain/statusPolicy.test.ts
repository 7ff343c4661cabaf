import { describe, expect, it } from 'vitest';

import {
  permissiveTransitions,
  resolveStatusPolicy,
  strictTransitions
} from '../../../src/domain/statusPolicy';

describe('status transition policies', () => {
  it('permits any move under the permissive policy', () => {
    expect(permissiveTransitions('completed', 'scheduled')).toBe(true);
    expect(permissiveTransitions('cancelled', 'confirmed')).toBe(true);
  });

  it('only allows forward moves under the strict policy', () => {
    expect(strictTransitions('scheduled', 'confirmed')).toBe(true);
    expect(strictTransitions('scheduled', 'no_show')).toBe(true);
    expect(strictTransitions('confirmed', 'completed')).toBe(true);
    expect(strictTransitions('scheduled', 'completed')).toBe(false);
    expect(strictTransitions('cancelled', 'scheduled')).toBe(false);
    expect(strictTransitions('completed', 'cancelled')).toBe(false);
  });

  it('allows re-setting the current status under the strict policy', () => {
    expect(strictTransitions('cancelled', 'cancelled')).toBe(true);
  });

  it('resolves a policy by name', () => {
    expect(resolveStatusPolicy('strict')).toBe(strictTransitions);
    expect(resolveStatusPolicy('permissive')).toBe(permissiveTransitions);
  });
});
