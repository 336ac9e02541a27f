import { credentialHasher } from "../services/credentialHasher.js";

/**
 * Prints a bcrypt hash for use in AUTH_SEED_USERS.
 * Usage: npm run hash-password -- <plaintext> [<plaintext> ...]
 */
const passwords = process.argv.slice(2);

if (passwords.length === 0) {
  process.stderr.write("usage: hash-password <plaintext> [<plaintext> ...]\n");
  process.exitCode = 1;
} else {
  for (const password of passwords) {
    process.stdout.write(`${await credentialHasher.hash(password)}\n`);
  }
}
