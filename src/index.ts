import { createProgram } from './program'

function main(): void {
  createProgram().parseAsync(process.argv)
    .then(() => {})
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      // eslint-disable-next-line no-console
      console.error(`Error: ${message}`)
      process.exitCode = 1
    })
}

main()
