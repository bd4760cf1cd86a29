/**
 * Evaluation Stack
 *
 * The "currently evaluating" stack. Every read made while a rule runs is
 * recorded against the frame on top, which becomes that rule's dependency set.
 * Nested reads that trigger recomputation push their own frame.
 */

import type { EvaluationFrame, GraphNode } from './types'
import { CyclicDependencyError } from '../errors'

export function createEvaluationStack() {
  const frames: EvaluationFrame[] = []

  function current(): EvaluationFrame | undefined {
    return frames[frames.length - 1]
  }

  function record(node: GraphNode): void {
    current()?.reads.add(node)
  }

  function enter(node: GraphNode): EvaluationFrame {
    if (node.evaluating) {
      throw new CyclicDependencyError(cyclePath(node))
    }
    const frame: EvaluationFrame = { node, reads: new Set() }
    node.evaluating = true
    frames.push(frame)
    return frame
  }

  function exit(frame: EvaluationFrame): void {
    frame.node.evaluating = false
    if (frames.pop() !== frame) {
      throw new Error(`Evaluation stack out of order leaving '${frame.node.key}'`)
    }
  }

  /** Keys from the first frame evaluating `node` up to the re-entry */
  function cyclePath(node: GraphNode): string[] {
    const start = frames.findIndex(f => f.node === node)
    return [...frames.slice(start).map(f => f.node.key), node.key]
  }

  function depth(): number {
    return frames.length
  }

  return { current, record, enter, exit, depth }
}

export type EvaluationStack = ReturnType<typeof createEvaluationStack>
