import { Injectable } from '@nestjs/common';
import {
  Bundle,
  BundleState,
  DISPATCH_CAPABILITIES,
  DISPATCH_WORKFLOW_RULES,
  DispatchErrorCode,
  DispatchEvent,
  DispatchUser,
  StatusTransitionRule,
  StatusTransitionValidation,
  UserRole,
} from '@fletes/shared';
import { AccessPolicyService } from '../access/access-policy.service';
import { stateError } from '../common/dispatch-errors';

export const SYSTEM_ACTOR = 'SYSTEM';
export const NOT_AUTHORIZED_MARK = 'NA';

const EVENT_LABELS: Record<DispatchEvent, string> = {
  [DispatchEvent.Ingest]: 'cargar',
  [DispatchEvent.Confirm]: 'confirmar',
  [DispatchEvent.Authorize]: 'autorizar',
  [DispatchEvent.Adjust]: 'ajustar',
  [DispatchEvent.Merge]: 'fusionar',
  [DispatchEvent.Split]: 'dividir',
  [DispatchEvent.Complete]: 'completar',
  [DispatchEvent.Delete]: 'eliminar',
};

/**
 * Bundle state machine. Transitions live in the shared rule table; this
 * service answers what is allowed and raises the matching error otherwise.
 */
@Injectable()
export class StatusWorkflowService {
  private readonly workflowRules: StatusTransitionRule[] = DISPATCH_WORKFLOW_RULES;

  constructor(private readonly accessPolicy: AccessPolicyService) {}

  findRule(from: BundleState, event: DispatchEvent): StatusTransitionRule | undefined {
    return this.workflowRules.find(r => r.from === from && r.event === event);
  }

  validateTransition(from: BundleState, event: DispatchEvent, role: UserRole): StatusTransitionValidation {
    const rule = this.findRule(from, event);
    if (!rule) {
      return {
        isValid: false,
        errorMessage: `No se puede ${EVENT_LABELS[event]} un vehículo en estado ${from}`,
      };
    }
    if (!DISPATCH_CAPABILITIES[rule.capability].includes(role)) {
      return {
        isValid: false,
        errorMessage: `El rol ${role} no puede ${EVENT_LABELS[event]} un vehículo en estado ${from}`,
        rule,
      };
    }
    return { isValid: true, rule };
  }

  /**
   * Check state, role and region for `event` on `bundle`. Wrong state is a
   * STATE error; missing capability or region is an AUTHORIZATION error.
   */
  assertTransition(bundle: Bundle, event: DispatchEvent, actor: DispatchUser): StatusTransitionRule {
    const rule = this.findRule(bundle.state, event);
    if (!rule) {
      const completed = bundle.state === BundleState.Completed;
      throw stateError({
        code: completed ? DispatchErrorCode.LineCompleted : DispatchErrorCode.InvalidState,
        message: `No se puede ${EVENT_LABELS[event]} el vehículo ${bundle.vehicleConsecutive} en estado ${bundle.state}`,
        context: { bundleId: bundle.vehicleConsecutive, state: bundle.state, event },
        region: actor.region,
      });
    }
    this.accessPolicy.assert(actor, rule.capability, bundle.region, bundle.vehicleConsecutive);
    return rule;
  }

  availableEvents(state: BundleState, role: UserRole): DispatchEvent[] {
    return this.workflowRules
      .filter(rule => rule.from === state && DISPATCH_CAPABILITIES[rule.capability].includes(role))
      .map(rule => rule.event);
  }

  /** Who authorized a freshly classified bundle: the system for preauthorized ones, nobody otherwise */
  authorizationStamp(state: BundleState, at: string): Pick<Bundle, 'authorizedBy' | 'authorizationTs'> {
    if (state === BundleState.Preauthorized) {
      return { authorizedBy: SYSTEM_ACTOR, authorizationTs: at };
    }
    return { authorizedBy: NOT_AUTHORIZED_MARK, authorizationTs: NOT_AUTHORIZED_MARK };
  }
}
