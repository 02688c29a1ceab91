import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// Try loading from current directory
dotenv.config();

// Running from `backend/` in the workspace: the .env usually lives one level up.
const cwd = process.cwd();
if (!process.env.BALLCHASING_API_KEY) {
    const rootEnvPath = path.resolve(cwd, '..', '.env');
    if (fs.existsSync(rootEnvPath)) {
        dotenv.config({ path: rootEnvPath });
    }
}
