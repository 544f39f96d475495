// scripts/build.ts
import path from 'node:path';

import { remove } from 'fs-extra/esm';

import { bundle, PROJECT_ROOT } from './bundle';

const OUT_DIR = path.join(PROJECT_ROOT, 'dist');

await remove(OUT_DIR);
const bin = await bundle(OUT_DIR);
console.log(`built ${bin}`);
