/**
 * Print a bearer token for the control API.
 *
 *   HUB_JWT_SECRET=... tsx server/scripts/token.ts <subject> [admin|viewer] [hours]
 */

import { issueToken } from '../middleware/auth';
import type { HubRole } from '../../src/types';

const [subject, roleArg = 'admin', hoursArg = '8'] = process.argv.slice(2);
const secret = process.env['HUB_JWT_SECRET'];

function fail(msg: string): never {
  console.error(msg);
  process.exit(1);
}

if (!secret) fail('HUB_JWT_SECRET must be set');
if (!subject) fail('usage: token.ts <subject> [admin|viewer] [hours]');
if (roleArg !== 'admin' && roleArg !== 'viewer') fail(`unknown role '${roleArg}'`);

const role: HubRole = roleArg;
const hours = Number(hoursArg);
if (!Number.isFinite(hours) || hours <= 0) fail(`invalid lifetime '${hoursArg}'`);

console.log(issueToken(secret, subject, role, Math.round(hours * 3600)));
