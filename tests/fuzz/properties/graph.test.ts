/**
 * Property tests for the cell graph.
 *
 * Whatever the order of writes and reads, a derived cell read after a write
 * agrees with a direct computation from the stored values.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { createCellGraph } from '../../../src/cell-graph'
import { createManualClock } from '../../../src/clock'
import { NOW, silentLogger } from '../../helpers/fixtures'

type Step =
  | { kind: 'write'; target: 0 | 1 | 2; value: number }
  | { kind: 'read'; target: 'sum' | 'scaled' | 'pick' }
  | { kind: 'batch'; writes: { target: 0 | 1 | 2; value: number }[] }

const targetGen = fc.constantFrom<0 | 1 | 2>(0, 1, 2)
const valueGen = fc.integer({ min: -50, max: 50 })

const stepGen: fc.Arbitrary<Step> = fc.oneof(
  fc.record({ kind: fc.constant('write' as const), target: targetGen, value: valueGen }),
  fc.record({ kind: fc.constant('read' as const), target: fc.constantFrom<'sum' | 'scaled' | 'pick'>('sum', 'scaled', 'pick') }),
  fc.record({
    kind: fc.constant('batch' as const),
    writes: fc.array(fc.record({ target: targetGen, value: valueGen }), { maxLength: 4 }),
  })
)

describe('Cell graph - no stale reads', () => {
  it('every derived read matches the current stored values', () => {
    fc.assert(
      fc.property(fc.array(stepGen, { maxLength: 30 }), (steps) => {
        const graph = createCellGraph({ clock: createManualClock(NOW), logger: silentLogger() })
        const owner = graph.entity('model', 'model')
        const inputs = [
          graph.stored(owner, 'x', 0),
          graph.stored(owner, 'y', 0),
          graph.stored(owner, 'z', 0),
        ] as const
        const model: [number, number, number] = [0, 0, 0]

        const sum = graph.derived(owner, 'sum', (ctx) => ctx.get(inputs[0]) + ctx.get(inputs[1]))
        const scaled = graph.derived(owner, 'scaled', (ctx) => ctx.get(sum) * ctx.get(inputs[2]))
        // Dependencies change with the sign of x
        const pick = graph.derived(owner, 'pick', (ctx) =>
          ctx.get(inputs[0]) >= 0 ? ctx.get(scaled) : ctx.get(inputs[1])
        )

        const expected = {
          sum: () => model[0] + model[1],
          scaled: () => (model[0] + model[1]) * model[2],
          pick: () => (model[0] >= 0 ? (model[0] + model[1]) * model[2] : model[1]),
        }
        const cells = { sum, scaled, pick }

        for (const step of steps) {
          if (step.kind === 'write') {
            graph.write(inputs[step.target], step.value)
            model[step.target] = step.value
          } else if (step.kind === 'batch') {
            graph.batch(() => {
              for (const w of step.writes) {
                graph.write(inputs[w.target], w.value)
                model[w.target] = w.value
              }
            })
          } else {
            expect(graph.read(cells[step.target])).toBe(expected[step.target]())
          }
        }

        expect(graph.read(pick)).toBe(expected.pick())
        expect(graph.read(scaled)).toBe(expected.scaled())
        expect(graph.read(sum)).toBe(expected.sum())
      })
    )
  })
})
