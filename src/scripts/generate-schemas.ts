import { join } from 'node:path';
import { generateSchemas } from '../commands/schema.ts';

// Editor schemas checked in under schemas/
for (const file of generateSchemas(join(process.cwd(), 'schemas'))) {
  console.log(`✓ ${file}`);
}
