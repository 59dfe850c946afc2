import { AllocationResult } from "./Allocation";
import { SipResult } from "./SIPProjection";
import { CalculatorError } from "./CalculatorError";

/**
 * Planning outcome data structures
 */

export interface PriceUpdateStatus {
  success: boolean;
  message: string;
  updated: number;
  total: number;
  missingSymbols: string[];
}

export interface AllocationSuccess {
  success: true;
  result: AllocationResult;
  priceUpdate: PriceUpdateStatus | null; // null when prices were not refreshed
  warnings: string[];
}

export interface SipSuccess {
  success: true;
  result: SipResult;
}

export interface PlanningFailure {
  success: false;
  error: CalculatorError;
}

export type AllocationOutcome = AllocationSuccess | PlanningFailure;

export type SipOutcome = SipSuccess | PlanningFailure;
