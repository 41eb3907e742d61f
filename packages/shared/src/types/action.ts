/**
 * Remediation actions and their results
 */

export const ACTION_KINDS = {
  SCALE_DEPLOYMENT: 'ScaleDeployment',
  INCREASE_RESOURCE_LIMITS: 'IncreaseResourceLimits',
  RESTART_DEPLOYMENT: 'RestartDeployment',
  DELETE_POD: 'DeletePod',
} as const;

export type ActionKind = (typeof ACTION_KINDS)[keyof typeof ACTION_KINDS];

export interface ScaleDeploymentAction {
  kind: typeof ACTION_KINDS.SCALE_DEPLOYMENT;
  deployment: string;
  namespace: string;
  replicas: number;
}

export interface IncreaseResourceLimitsAction {
  kind: typeof ACTION_KINDS.INCREASE_RESOURCE_LIMITS;
  deployment: string;
  namespace: string;
  /** Quantity such as `256Mi`, applied as both limit and request */
  memoryLimit: string;
  /** Quantity such as `200m`, applied as both limit and request */
  cpuLimit: string;
}

export interface RestartDeploymentAction {
  kind: typeof ACTION_KINDS.RESTART_DEPLOYMENT;
  deployment: string;
  namespace: string;
}

export interface DeletePodAction {
  kind: typeof ACTION_KINDS.DELETE_POD;
  pod: string;
  namespace: string;
}

export type Action =
  | ScaleDeploymentAction
  | IncreaseResourceLimitsAction
  | RestartDeploymentAction
  | DeletePodAction;

export type ActionTarget =
  | { namespace: string; deployment: string }
  | { namespace: string; pod: string };

interface ActionResultBase {
  kind: ActionKind;
  target: ActionTarget;
  dryRun: boolean;
}

export interface ActionSuccess extends ActionResultBase {
  success: true;
  message: string;
}

export interface ActionFailure extends ActionResultBase {
  success: false;
  error: string;
}

export type ActionResult = ActionSuccess | ActionFailure;

/**
 * Target of an action, independent of its kind
 */
export function actionTarget(action: Action): ActionTarget {
  if (action.kind === ACTION_KINDS.DELETE_POD) {
    return { namespace: action.namespace, pod: action.pod };
  }
  return { namespace: action.namespace, deployment: action.deployment };
}

/**
 * `namespace/name` of an action's target
 */
export function describeTarget(target: ActionTarget): string {
  const name = 'pod' in target ? target.pod : target.deployment;
  return `${target.namespace}/${name}`;
}
