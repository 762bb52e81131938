import seedrandom from 'seedrandom'
import { Game } from './game'
import { DEFAULT_LAYOUT, loadLayout } from './layout'
import { randomRollout } from './rollout'

const start = parseInt(process.argv[2] || '0')
const count = parseInt(process.argv[3] || '100')
const horizon = parseInt(process.argv[4] || '100')
const layoutFile = process.argv[5]

const layout = layoutFile ? loadLayout(layoutFile) : DEFAULT_LAYOUT
const game = new Game({ horizon }, layout)

for (let i = 0; i < count; i++) {
  const seed = start + i
  const result = randomRollout(game, seedrandom(String(seed)))
  console.log(JSON.stringify({ seed, layout: layout.id, ...result }))
}
