#!/usr/bin/env node
/**
 * bin/toolgate.ts: entry point for the `toolgate` command.
 *
 *   toolgate tools
 *   toolgate call toggle_firewall_policy --args '{"policy_id":"fw-block-iot"}'
 *   toolgate call toggle_firewall_policy --args '{"policy_id":"fw-block-iot"}' --confirm
 *   toolgate batch requests.json
 *   toolgate permissions
 *   toolgate manifest
 *   toolgate log --decision denied
 */

import { program } from '../commands/index.js'

await program.parseAsync()
