/**
 * SAUL resource table
 *
 * Every endpoint is a pure function of (request, reply buffer) -> (code, bytes used).
 * Fixed-category endpoints are rows of SENSE_SHORTCUTS and share one handler.
 */
import { ACT_SERVO, SENSE_HUM, SENSE_PRESS, SENSE_TEMP, SENSE_VOLTAGE } from '../../core/categories'
import type { ReplyBuffer } from './encoder'
import type { SaulService } from './service'
import type { EncodedReply, SaulRequest } from './types'

export type SaulMethod = 'GET' | 'POST'

export type SaulHandler = (request: SaulRequest, reply: ReplyBuffer) => EncodedReply

export interface SaulResource {
  path: string
  method: SaulMethod
  summary: string
  handler: SaulHandler
}

export interface SenseShortcut {
  path: string
  category: number
  summary: string
}

export const SENSE_SHORTCUTS: readonly SenseShortcut[] = [
  { path: '/temp', category: SENSE_TEMP, summary: 'Read the first temperature sensor' },
  { path: '/hum', category: SENSE_HUM, summary: 'Read the first humidity sensor' },
  { path: '/press', category: SENSE_PRESS, summary: 'Read the first pressure sensor' },
  { path: '/voltage', category: SENSE_VOLTAGE, summary: 'Read the first voltage sensor' },
  { path: '/servo', category: ACT_SERVO, summary: 'Read the first servo position' },
]

/**
 * Build the resource table, sorted by path (ASCII order)
 */
export function buildSaulResources(service: SaulService): SaulResource[] {
  const resources: SaulResource[] = [
    { path: '/saul/cnt', method: 'GET', summary: 'Count registered devices', handler: service.count },
    { path: '/saul/dev', method: 'POST', summary: 'Describe the device at an index', handler: service.lookupDevice },
    { path: '/sensor', method: 'GET', summary: 'Read the first device of a category', handler: service.readFromQuery },
    ...SENSE_SHORTCUTS.map(
      (shortcut): SaulResource => ({
        path: shortcut.path,
        method: 'GET',
        summary: shortcut.summary,
        handler: (_request, reply) => service.readCategory(shortcut.category, reply),
      })
    ),
  ]

  return resources.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
}
