/**
 * backend/src/modules/bootstrap/bootstrap.types.ts
 */

/** NeedsBootstrap: no live user document, or one without an active tenant. */
export type BootstrapState = 'NeedsBootstrap' | 'Ready';

export type BootstrapResult = {
  userId: string;
  activeTenantId: string;
  /** True when this call moved the user from NeedsBootstrap to Ready. */
  bootstrapped: boolean;
};
