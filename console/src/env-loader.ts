// Environment variable loader - must be imported before anything reads `env`
import dotenv from 'dotenv';
import path from 'node:path';

// Working directory first, then its parent (running from inside console/).
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '..', '.env') });
