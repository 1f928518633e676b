// @vitest-environment node

import { describe, expect, it } from 'vitest'
import { assessFeed } from './feedHealth'

describe('assessFeed', () => {
  it('waits until the first reading arrives', () => {
    expect(assessFeed(0, 5000)).toEqual({ status: 'waiting', ageMs: 0, missedTicks: 0 })
  })

  it('tolerates half a tick of jitter', () => {
    expect(assessFeed(1000, 1000)).toEqual({ status: 'live', ageMs: 0, missedTicks: 0 })
    expect(assessFeed(1000, 2400)).toEqual({ status: 'live', ageMs: 1400, missedTicks: 0 })
  })

  it('counts overdue readings', () => {
    expect(assessFeed(1000, 2500)).toEqual({ status: 'late', ageMs: 1500, missedTicks: 1 })
    expect(assessFeed(1000, 4499)).toEqual({ status: 'late', ageMs: 3499, missedTicks: 2 })
    expect(assessFeed(1000, 4500)).toEqual({ status: 'stalled', ageMs: 3500, missedTicks: 3 })
  })

  it('scales with the tick length', () => {
    expect(assessFeed(100, 350, 250)).toEqual({ status: 'live', ageMs: 250, missedTicks: 0 })
    expect(assessFeed(100, 500, 250)).toEqual({ status: 'late', ageMs: 400, missedTicks: 1 })
  })

  it('never reports a negative age', () => {
    expect(assessFeed(2000, 1500)).toEqual({ status: 'live', ageMs: 0, missedTicks: 0 })
  })
})
