import chalk from 'chalk'

export async function delay(ms: number) {
  return new Promise(res => setTimeout(res, ms))
}

type StepFn = () => void | Promise<void>

export class DemoSteps {
  private steps: { label: string; durationMs: number; fn: StepFn }[] = []

  step(...args: [label: string, fn: StepFn] | [durationMs: number, label: string, fn: StepFn]): this {
    if (args.length === 2) {
      const [label, fn] = args
      this.steps.push({ durationMs: 1000, label, fn })
    } else {
      const [durationMs, label, fn] = args
      this.steps.push({ durationMs, label, fn })
    }
    return this
  }

  async run() {
    const total = this.steps.length
    for (const [i, { durationMs, label, fn }] of this.steps.entries()) {
      const prefix = chalk.cyanBright.bold(`[${i + 1} / ${total}]`)
      const desc = chalk.white.bold(label)

      const startTime = performance.now()
      console.log(`\n${prefix} ${desc}`)
      try {
        await fn()
      } catch (error) {
        console.log(chalk.red(`✘ ${error instanceof Error ? error.message : String(error)}`))
      }

      const elapsed = performance.now() - startTime
      if (elapsed < durationMs) {
        await delay(durationMs - elapsed)
      }
    }
  }

  async runForever(label: string, fn?: StepFn) {
    await this.run()

    console.log(chalk.greenBright.bold(`\n${label}`))
    await fn?.()

    await new Promise(() => {
      return
    })
  }
}
