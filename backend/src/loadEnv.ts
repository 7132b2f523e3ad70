import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// Working directory first; dotenv never overrides variables that are already set.
dotenv.config();

// `npm run -w backend` starts in backend/, while the .env sits in the workspace root.
const rootEnvPath = path.resolve(process.cwd(), '..', '.env');
if (!process.env.GRID_API_KEY && fs.existsSync(rootEnvPath)) {
    dotenv.config({ path: rootEnvPath });
}
