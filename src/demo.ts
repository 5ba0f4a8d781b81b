import dotenv from 'dotenv';
import { performance } from 'node:perf_hooks';
import { AccountStore } from './account-store';
import { resolveDemoLocation } from './config';
import { NotFoundError } from './errors';

dotenv.config();

async function main() {
  const location = resolveDemoLocation(process.argv.slice(2), process.env);
  const store = await AccountStore.initialize(location);

  try {
    await store.createUser('admin', 'password123', 'admin@example.com', true);
    await store.createUser('john_doe', 'mypassword', 'john@example.com', false);
    await store.createUser('jane_smith', 'secret456', 'jane@example.com', false);

    console.log('Testing authentication...');
    console.log(await store.authenticate('admin', 'password123'));
    // Bound as a literal username, so this is just an unknown user.
    console.log(await store.authenticate("admin' OR '1'='1", 'anything'));

    try {
      console.log(await store.getPermissions('nonexistent_user'));
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      console.log(`Handled missing user: ${error.message}`);
    }

    console.log("Finding users with prefix 'j'...");
    const start = performance.now();
    const results = await store.findByPrefix('j');
    const elapsed = performance.now() - start;
    console.log(`Found users: ${JSON.stringify(results)}`);
    console.log(`Time taken: ${(elapsed / 1000).toFixed(4)} seconds`);
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  console.error('Demo failed:', error);
  process.exit(1);
});
