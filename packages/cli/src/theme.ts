import chalk, { type ChalkInstance } from 'chalk'
import { DispatchDecision, RegistrationStatus } from '@toolgate/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _statusColors: Record<string, ChalkInstance> = {
  [RegistrationStatus.Callable]:   t.green,
  [RegistrationStatus.Denied]:     t.red,
  [RegistrationStatus.Unresolved]: t.amber,
}

export const statusColor = (status: string): ChalkInstance =>
  _statusColors[status] ?? t.muted

const _decisionColors: Record<string, ChalkInstance> = {
  [DispatchDecision.Executed]:   t.green,
  [DispatchDecision.Previewed]:  t.amber,
  [DispatchDecision.Denied]:     t.red,
  [DispatchDecision.Unknown]:    t.red,
  [DispatchDecision.Invalid]:    t.red,
  [DispatchDecision.LoadFailed]: t.red,
  [DispatchDecision.Failed]:     t.red,
}

export const decisionColor = (decision: string): ChalkInstance =>
  _decisionColors[decision] ?? t.muted

export const allowedColor = (allowed: boolean): ChalkInstance =>
  allowed ? t.green : t.red
