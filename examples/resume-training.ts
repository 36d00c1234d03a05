/**
 * Resumable training loop
 *
 * Trains for a few steps, saves the pipeline position next to a (pretend)
 * model checkpoint, then resumes in a fresh pipeline and checks that the
 * resumed run sees exactly the examples the uninterrupted run would have.
 *
 * Run with: npm run example
 */

import { writeFileSync, readFileSync, mkdtempSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { Logger, tapeline } from '@tapeline/core'
import { Data, type PipelineState } from '@tapeline/data'

interface Example {
  id: number
  text: string
}

tapeline.config({ logLevel: 'info' })

const examples: Example[] = Array.from({ length: 5 }, (_, id) => ({ id, text: `sentence ${id}` }))
const loader = Data.list(examples).repeat(3)

// Reference run, never interrupted
const reference = [...loader.build()].map((example) => example.id)

// Interrupted run
const pipeline = loader.build()
const seen: number[] = []
for (let step = 0; step < 7; step++) {
  const example = pipeline.next()
  if (example === undefined) break
  seen.push(example.id)
}

const checkpointDir = mkdtempSync(join(tmpdir(), 'tapeline-'))
const checkpointPath = join(checkpointDir, 'data-state.json')
writeFileSync(checkpointPath, JSON.stringify(pipeline.stateDict()))
Logger.info(`saved data position after ${seen.length} steps to ${checkpointPath}`)

// Resume in a freshly built pipeline
const state: PipelineState = JSON.parse(readFileSync(checkpointPath, 'utf8'))
const resumed = loader.build()
resumed.loadStateDict(state)
for (const example of resumed) {
  seen.push(example.id)
}

const matches = seen.length === reference.length && seen.every((id, i) => id === reference[i])
Logger.info(`resumed run ${matches ? 'matches' : 'DIFFERS FROM'} the reference run`)
