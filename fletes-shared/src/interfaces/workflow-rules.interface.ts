import { BundleState } from '../enums/bundle-state.enum';
import { DispatchCapability } from './access-policy.interface';

export enum DispatchEvent {
  Ingest = 'INGEST',
  Confirm = 'CONFIRM',
  Authorize = 'AUTHORIZE',
  Adjust = 'ADJUST',
  Merge = 'MERGE',
  Split = 'SPLIT',
  Complete = 'COMPLETE',
  Delete = 'DELETE'
}

/**
 * One allowed transition. `to` is absent when the target state is decided by
 * the pricing kernel (reclassification) or when the bundle is removed.
 */
export interface StatusTransitionRule {
  from: BundleState;
  event: DispatchEvent;
  to?: BundleState;
  capability: DispatchCapability;
}

export interface StatusTransitionValidation {
  isValid: boolean;
  errorMessage?: string;
  rule?: StatusTransitionRule;
}

const reclassifiable: BundleState[] = [
  BundleState.Preauthorized,
  BundleState.RequiresCoordinator,
  BundleState.RequiresControl
];

/**
 * Standard dispatch workflow. Ingest has no source state and is handled by
 * the ingest normalizer directly.
 */
export const DISPATCH_WORKFLOW_RULES: StatusTransitionRule[] = [
  {
    from: BundleState.Preauthorized,
    event: DispatchEvent.Confirm,
    to: BundleState.Authorized,
    capability: DispatchCapability.ConfirmPreauthorized
  },
  {
    from: BundleState.RequiresCoordinator,
    event: DispatchEvent.Authorize,
    to: BundleState.Authorized,
    capability: DispatchCapability.AuthorizeRequiresCoordinator
  },
  {
    from: BundleState.RequiresControl,
    event: DispatchEvent.Authorize,
    to: BundleState.Authorized,
    capability: DispatchCapability.AuthorizeRequiresControl
  },
  ...[...reclassifiable, BundleState.Authorized].map(from => ({
    from,
    event: DispatchEvent.Adjust,
    capability: DispatchCapability.AdjustBundle
  })),
  ...reclassifiable.map(from => ({
    from,
    event: DispatchEvent.Merge,
    capability: DispatchCapability.MergeBundles
  })),
  ...reclassifiable.map(from => ({
    from,
    event: DispatchEvent.Split,
    capability: DispatchCapability.SplitBundle
  })),
  {
    from: BundleState.Authorized,
    event: DispatchEvent.Complete,
    to: BundleState.Completed,
    capability: DispatchCapability.LoadPedidoNumbers
  },
  ...[...reclassifiable, BundleState.Authorized].map(from => ({
    from,
    event: DispatchEvent.Delete,
    capability: DispatchCapability.DeleteBundle
  }))
];
