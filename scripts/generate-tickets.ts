import { env } from '../src/config/environment';
import { createStore } from '../src/store';
import { createContainer } from '../src/container';
import { AppError } from '../src/types/error.types';

/**
 * Generate the ticket numbers of a raffle
 *
 * Usage: npm run generate:tickets -- <raffleId> [--force]
 */
const USAGE = 'Usage: npm run generate:tickets -- <raffleId> [--force]';

interface Args {
  raffleId: string;
  force: boolean;
}

function parseArgs(argv: string[]): Args | null {
  const force = argv.includes('--force');
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  const [raffleId] = positional;
  if (!raffleId || positional.length > 1) {
    return null;
  }
  return { raffleId, force };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const container = createContainer({ store: createStore(env) });
  try {
    const result = await container.raffles.generateTickets(args.raffleId, { force: args.force });
    if (result.deleted > 0) {
      console.log(`🗑  Deleted ${result.deleted} existing tickets`);
    }
    console.log(`✅ Generated ${result.generated} tickets for raffle ${result.raffleId}`);
  } catch (error) {
    if (error instanceof AppError) {
      console.error(`❌ ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await container.store.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
