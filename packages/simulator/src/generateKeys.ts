import { writeFile } from 'fs/promises';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { isLeft } from 'fp-ts/Either';
import { createLogger, derivePublicKey, generatePrivateKey } from '@coinsim/core';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const logger = createLogger('KEYS');

// Roles to generate keys for
const roles = ['WALLET', 'RECIPIENT', 'FARMER'];

const keyPairs = roles.map(role => {
  const privateKey = generatePrivateKey();
  const publicKey = derivePublicKey(privateKey);
  if (isLeft(publicKey)) {
    throw new Error(`Failed to derive public key for ${role}: ${publicKey.left.message}`);
  }
  return { role, privateKey, publicKey: publicKey.right };
});

// Generate .env content
const envContent = `# Simulation key pairs - DO NOT USE IN PRODUCTION
${keyPairs.map(({ role, privateKey, publicKey }) => `
# ${role} ${publicKey}
${role}_PRIVATE_KEY=${privateKey}`).join('\n')}

SIMULATION_ROUNDS=5
LOG_LEVEL=INFO
`;

await writeFile(resolve(__dirname, '../.env'), envContent);

keyPairs.forEach(({ role, publicKey }) => logger.info(`${role} public key ${publicKey}`));
