#!/usr/bin/env tsx

import { config as loadEnv } from 'dotenv'

loadEnv()

function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return Promise.resolve('')
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    process.stdin.on('data', (chunk) => chunks.push(Buffer.from(chunk)))
    process.stdin.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf-8'))
    })
    process.stdin.on('error', reject)
  })
}

async function main() {
  // Loaded after dotenv so LOG_LEVEL and QUIZ_* settings from .env apply
  const { moduleLogger } = await import('../src/logger')
  const { parseArgs, runGenerate, runGrade, usage } = await import('../src/cli')

  const logger = moduleLogger('cli')

  const args = parseArgs(process.argv.slice(2))

  if (args.help) {
    console.error(usage())
    return
  }

  if (!args.command) {
    console.error(usage())
    process.exit(1)
  }

  const input = (await readStdin()).trim()
  if (!input) {
    logger.error('No input provided. Pipe the passage or grade payload via STDIN.')
    process.exit(1)
  }

  if (args.command === 'generate') {
    const output = runGenerate(input, args)
    logger.info({ count: output.count }, 'Questions generated')
    console.log(JSON.stringify(output, null, 2))
    return
  }

  const report = runGrade(input)
  if (!report.ok) {
    logger.error({ err: report.error, errorType: report.error.name }, report.error.message)
    process.exit(1)
  }

  console.log(JSON.stringify(report.value, null, 2))
}

main().catch((error) => {
  console.error('quiz-engine failed:')
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})
