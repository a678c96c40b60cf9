export enum BundleState {
  Preauthorized = 'PREAUTHORIZED',
  RequiresCoordinator = 'REQUIRES_COORDINATOR',
  RequiresControl = 'REQUIRES_CONTROL',
  Authorized = 'AUTHORIZED',
  Completed = 'COMPLETED'
}

/** States in which a bundle has not yet been authorized by anyone */
export const PRE_AUTHORIZATION_STATES: readonly BundleState[] = [
  BundleState.Preauthorized,
  BundleState.RequiresCoordinator,
  BundleState.RequiresControl
];
