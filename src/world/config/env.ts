import { config as loadDotenv } from 'dotenv';
import { cleanEnv, num, str } from 'envalid';

loadDotenv();

export const env = cleanEnv(process.env, {
  WORLD_SEED: num({ default: 42 }),
  WORLD_WIDTH: num({ default: 80 }),
  WORLD_HEIGHT: num({ default: 40 }),
  WORLD_OUTPUT: str({ default: 'output/world.json' }),
});
