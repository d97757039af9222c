import type { RuleHandler } from '../types.js'
import { assignExactlyOne } from './assign-exactly-one.js'
import { atMostOne } from './at-most-one.js'
import { equalDaysWorked } from './equal-days-worked.js'
import { equalizedShiftType } from './equalized-shift-type.js'
import { maxShift } from './max-shift.js'
import { vehicleCapacity } from './vehicle-capacity.js'
import { weatherPenalty } from './weather-penalty.js'
import { workloadBalance } from './workload-balance.js'

const RULES: Readonly<Record<string, RuleHandler>> = Object.freeze({
  assign_exactly_one: assignExactlyOne,
  at_most_one: atMostOne,
  workload_balance: workloadBalance,
  max_shift: maxShift,
  vehicle_capacity: vehicleCapacity,
  equalized_shift_type: equalizedShiftType,
  equal_days_worked: equalDaysWorked,
  weather_penalty: weatherPenalty,
})

/** Params any rule accepts: the decision tensor and the kept dimensions. */
const SHARED_PARAMS = ['variable', 'dims']

const RULE_PARAMS: Readonly<Record<string, readonly string[]>> = Object.freeze({
  assign_exactly_one: [],
  at_most_one: ['over', 'dimension'],
  workload_balance: ['resource', 'tolerance'],
  max_shift: ['resource', 'per', 'hours', 'stop_hours', 'service_time'],
  vehicle_capacity: ['resource', 'per', 'capacity', 'demand'],
  equalized_shift_type: ['resource', 'dim', 'shift_ids'],
  equal_days_worked: ['resource', 'day'],
  weather_penalty: ['wx_ref', 'threshold', 'penalty'],
})

/** Rules whose only output is objective penalties. */
export const PENALTY_ONLY_RULES: ReadonlySet<string> = new Set(['weather_penalty'])

export function knownRules(): string[] {
  return Object.keys(RULES)
}

export function isKnownRule(rule: string): boolean {
  return Object.prototype.hasOwnProperty.call(RULES, rule)
}

export function ruleHandler(rule: string): RuleHandler | undefined {
  return isKnownRule(rule) ? RULES[rule] : undefined
}

export function ruleParams(rule: string): string[] {
  return isKnownRule(rule) ? [...SHARED_PARAMS, ...(RULE_PARAMS[rule] ?? [])] : []
}
