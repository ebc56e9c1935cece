/**
 * Loads .env before any module reads BANKWIRE_* or LOG_LEVEL.
 * Import this first.
 */
import { config } from 'dotenv';

config();
