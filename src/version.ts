import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';

const PackageJson = z.object({ name: z.string(), version: z.string() });

/** package.json sits one level above both src/ and dist/. */
export function readPackageInfo(): z.infer<typeof PackageJson> {
    return PackageJson.parse(fs.readJsonSync(path.resolve(__dirname, '../package.json')));
}
