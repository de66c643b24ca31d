import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { COLOR_TABLES, COLORMAP_VARIANTS, artifactKey, decodeRadarFile, imageCorners, renderVariants } from '../radar';

// Render one ODIM file from disk: tsx scripts/render_local.ts <file.hdf> [outDir]
const [input, outDir = 'data/local'] = process.argv.slice(2);

if (!input) {
    console.error('Usage: tsx scripts/render_local.ts <file.hdf> [outDir]');
    process.exit(1);
}

const grid = await decodeRadarFile(input);
await mkdir(outDir, { recursive: true });

for (const variant of renderVariants(grid, [1, 2], COLORMAP_VARIANTS.map((v) => COLOR_TABLES[v]))) {
    const key = artifactKey({ timestamp: grid.timestamp, variant: variant.variant, scale: variant.scale });
    await writeFile(path.join(outDir, key), variant.png);
    console.log(`Wrote ${key} (${variant.png.length} bytes)`);
}

console.log(`Grid ${grid.width}x${grid.height} at ${grid.timestamp}`);
console.log(`Corners: ${JSON.stringify(imageCorners(grid.bounds))}`);
