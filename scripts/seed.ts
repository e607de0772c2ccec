import 'dotenv/config'
import { connectDatabase, disconnectDatabase } from '../src/db/connection.js'
import { createRepo } from '../src/db/repo.js'
import { loadConfig } from '../src/lib/config.js'
import { createEmbeddingProvider } from '../src/lib/embeddings.js'
import { createLogger } from '../src/lib/logger.js'
import { repoIndexStore, SemanticIndex } from '../src/services/semanticIndex.js'
import type { CharacterInput } from '../src/types.js'

// A handful of characters for poking at the API without a catalog import.
const characters: CharacterInput[] = [
  { id: '1', name: 'Luke Skywalker', affiliations: ['Rebel Alliance', 'Jedi Order'], masters: ['10', '20'], species: 'human', homeworld: 'tatooine',
    biography: 'A farm boy from a desert world who becomes a Jedi Knight and helps topple the Empire.' },
  { id: '2', name: 'C-3PO', affiliations: ['Rebel Alliance'], masters: [], species: 'droid', homeworld: 'tatooine',
    biography: 'A fussy protocol droid fluent in over six million forms of communication.' },
  { id: '3', name: 'R2-D2', affiliations: ['Rebel Alliance'], masters: [], species: 'droid', homeworld: 'naboo',
    biography: 'A brave astromech droid who repairs starships and carries secret plans.' },
  { id: '4', name: 'Darth Vader', affiliations: ['Galactic Empire', 'Sith'], masters: ['21'], species: 'human', homeworld: 'tatooine' },
  { id: '10', name: 'Obi-Wan Kenobi', affiliations: ['Jedi Order'], masters: ['32'], species: 'human', homeworld: 'stewjon' },
  { id: '20', name: 'Yoda', affiliations: ['Jedi Order'], masters: [], species: 'yoda\'s species' },
  { id: '21', name: 'Palpatine', affiliations: ['Galactic Empire', 'Sith'], masters: [], species: 'human', homeworld: 'naboo' },
  { id: '32', name: 'Qui-Gon Jinn', affiliations: ['Jedi Order'], masters: [], species: 'human' },
]

async function main() {
  const config = loadConfig()
  const logger = createLogger(config.logLevel)
  await connectDatabase(config, logger)

  const repo = createRepo({ provider: config.dbProvider })
  const index = new SemanticIndex({
    store: repoIndexStore(repo),
    provider: createEmbeddingProvider(config),
    timeoutMs: config.embedding.timeoutMs,
    logger,
  })

  for (const input of characters) {
    const { character } = await repo.upsertCharacter(input)
    await index.upsert(character)
  }

  const team = await repo.createTeam({ name: 'Quickstart Squad' })

  console.log('Seeded:')
  console.log(' characters:', characters.length)
  console.log(' teamId:', team.id)

  await index.close()
  await disconnectDatabase(config)
}

main().catch((e)=>{ console.error(e); process.exit(1) })
