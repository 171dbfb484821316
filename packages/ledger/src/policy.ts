import type { LedgerView } from "./store";

export interface ApprovalRequest {
  from: string;
  to: string;
  approver: string;
  amount: bigint;
}

/**
 * Decides whether a Transfer may name its approver. Consulted at Transfer
 * time only; Approve checks the stored approver, never the policy.
 */
export type ApprovalPolicy = (request: ApprovalRequest, view: LedgerView) => boolean;

export const anyApprover: ApprovalPolicy = () => true;

export const thirdPartyApprover: ApprovalPolicy = (request) =>
  request.approver !== request.from && request.approver !== request.to;

export const registeredApprover: ApprovalPolicy = (request, view) => view.getWallet(request.approver) !== undefined;

export function allOf(...policies: ApprovalPolicy[]): ApprovalPolicy {
  return (request, view) => policies.every((policy) => policy(request, view));
}

export const APPROVAL_POLICY_NAMES = ["any", "third-party", "registered", "third-party-registered"] as const;

export type ApprovalPolicyName = (typeof APPROVAL_POLICY_NAMES)[number];

/** Approvers must own a wallet; a Transfer cannot escrow funds to an unknown key. */
export const DEFAULT_APPROVAL_POLICY: ApprovalPolicyName = "registered";

const namedPolicies: Record<ApprovalPolicyName, ApprovalPolicy> = {
  any: anyApprover,
  "third-party": thirdPartyApprover,
  registered: registeredApprover,
  "third-party-registered": allOf(thirdPartyApprover, registeredApprover)
};

export function isApprovalPolicyName(value: unknown): value is ApprovalPolicyName {
  return typeof value === "string" && APPROVAL_POLICY_NAMES.some((name) => name === value);
}

export function resolveApprovalPolicy(name: ApprovalPolicyName): ApprovalPolicy {
  return namedPolicies[name];
}
