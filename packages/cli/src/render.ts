/**
 * Human-readable renderers. Each returns the full text for stdout; commands
 * print it. `--json` output bypasses these entirely.
 */

import { JobStatus, OperationAction } from '@toolgate/kernel'
import type {
  BatchStatusResponse,
  ConfirmationRequired,
  DiscoveryResponse,
  DispatchFailure,
  DispatchResponse,
  ValidationIssue,
} from '@toolgate/kernel'
import type { DecisionReadResult } from '@toolgate/runtime-host'
import type { PermissionRow } from './permission-matrix.js'
import { allowedColor, decisionColor, statusColor, t } from './theme.js'

const pad = (s: string, width: number): string => s + ' '.repeat(Math.max(1, width - s.length))

export function renderIssues(title: string, issues: ReadonlyArray<ValidationIssue>): string {
  let out = t.red(title) + '\n'
  for (const issue of issues) {
    const where = issue.context !== undefined && issue.context !== '' ? t.muted(issue.context + ': ') : ''
    out += '  - ' + where + issue.message + '\n'
  }
  return out
}

export function renderTools(discovery: DiscoveryResponse): string {
  let out = '\n  ' + t.muted('tools') + '  ' + t.white(String(discovery.count)) + '\n\n'
  for (const tool of discovery.tools) {
    const scope = `${tool.category}/${tool.action}`
    out += (
      '    ' +
      statusColor(tool.status)('●') + ' ' +
      t.white(pad(tool.name, 26)) +
      t.blueDim(pad(scope, 28)) +
      statusColor(tool.status)(tool.status) +
      '\n' +
      '      ' + t.dim(tool.description) + '\n'
    )
  }
  return out
}

export function renderResponse(response: DispatchResponse): string {
  if (response.success) {
    return JSON.stringify(response.data, null, 2) + '\n'
  }
  if ('requires_confirmation' in response) {
    return renderConfirmation(response)
  }
  return renderFailure(response)
}

function renderConfirmation(response: ConfirmationRequired): string {
  const target = response.resource_name ?? response.resource_id ?? ''
  let out = t.amber(`confirmation required: ${response.action} ${response.resource_type} ${target}`.trimEnd()) + '\n'
  out += t.muted('  current:  ') + JSON.stringify(response.preview.current) + '\n'
  out += t.muted('  proposed: ') + JSON.stringify(response.preview.proposed) + '\n'
  for (const warning of response.warnings ?? []) {
    out += t.amber('  ⚠ ' + warning) + '\n'
  }
  out += response.message + '\n'
  return out
}

function renderFailure(response: DispatchFailure): string {
  let out = t.red(`error [${response.code}] ${response.error}`) + '\n'
  for (const detail of response.details ?? []) {
    const where = detail.context !== undefined ? detail.context + ': ' : ''
    out += '  - ' + where + detail.message + '\n'
  }
  return out
}

export function renderBatchStatus(status: BatchStatusResponse): string {
  let out = ''
  for (const job of status.jobs) {
    const failed = job.status === JobStatus.Error || job.status === 'unknown'
    const color = failed ? t.red : job.status === JobStatus.Done ? t.green : t.amber
    out += pad(job.jobId, 38) + color(pad(job.status, 9))
    if (job.error !== undefined) {
      out += (job.code !== undefined ? `[${job.code}] ` : '') + job.error
    } else if (job.result !== undefined) {
      out += JSON.stringify(job.result)
    }
    out += '\n'
  }
  return out
}

export function renderPermissions(rows: ReadonlyArray<PermissionRow>): string {
  const actions = Object.values(OperationAction)
  let out = '\n  ' + pad('category', 20) + actions.map((a) => pad(a, 24)).join('') + '\n'
  const categories = [...new Set(rows.map((r) => r.category))]
  for (const category of categories) {
    out += '  ' + t.white(pad(category, 20))
    for (const action of actions) {
      const row = rows.find((r) => r.category === category && r.action === action)
      if (row === undefined) {
        out += pad('-', 24)
        continue
      }
      const cell = (row.allowed ? 'allow' : 'deny') + ' (' + row.source + ')'
      out += allowedColor(row.allowed)(pad(cell, 24))
    }
    out += '\n'
  }
  return out
}

export function renderDecisions(result: DecisionReadResult): string {
  let out = ''
  for (const event of result.events) {
    out += (
      t.dim(event.timestamp) + '  ' +
      decisionColor(event.decision)(pad(event.decision, 12)) +
      t.white(pad(event.operation, 26)) +
      t.muted(event.job_id !== undefined ? `job ${event.job_id}  ` : '') +
      (event.error !== undefined ? t.red(event.error) : '') +
      '\n'
    ).replace(/ +\n$/, '\n')
  }
  const { stats } = result
  out += t.muted(
    `${result.events.length} shown, ${stats.parsedEvents} in log` +
    (stats.parseErrors > 0 ? `, ${stats.parseErrors} unreadable lines` : '') +
    (stats.partialTrailingLine ? ', partial last line skipped' : ''),
  ) + '\n'
  return out
}
