#!/usr/bin/env node

import { loadConfig } from './config.js';
import { CatalogMCPServer } from './server.js';

// Start the server
try {
  const server = new CatalogMCPServer(loadConfig());
  server.run().catch(error => {
    console.error('Server error:', error);
    process.exit(1);
  });
} catch (error) {
  console.error('Failed to start server:', error);
  process.exit(1);
}
