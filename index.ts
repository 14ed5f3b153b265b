#!/usr/bin/env node
/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { config as loadDotenv } from 'dotenv'
import { loadConfig } from './config.js'
import { errorMessage } from './errors.js'
import { createServerContext, product } from './server.js'
import { runTransport } from './transports.js'

async function main (): Promise<void> {
  // stdout carries the stdio protocol, so dotenv must stay quiet
  loadDotenv({ quiet: true })

  const config = loadConfig()
  const context = createServerContext(config)
  const running = await runTransport(context, config)

  const clusters = Object.keys(config.clusters)
  console.error(
    `${product.name} ${product.version} started (transport: ${config.transport}, namespace: ${config.namespace}, ` +
      `default cluster: ${config.cluster.url}${clusters.length > 0 ? `, named clusters: ${clusters.join(', ')}` : ''})`
  )

  process.on('SIGINT', () => {
    running.close()
      .then(async () => await context.close())
      .catch((error) => console.error(`Shutdown failed: ${errorMessage(error)}`))
      .finally(() => process.exit(0))
  })
}

main().catch((error) => {
  console.error(
    'Server error:',
    error instanceof Error ? error.message : String(error)
  )
  process.exit(1)
})
