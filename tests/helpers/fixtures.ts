import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'

const fixturesDir = resolve(process.cwd(), 'tests/fixtures')

export function loadFixture(relativePath: string): string {
  return readFileSync(resolve(fixturesDir, relativePath), 'utf8')
}
