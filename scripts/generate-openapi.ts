import fs from 'fs';
import path from 'path';
import { getOpenApiSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document to dist/openapi.json
 */
const outputPath = path.join(__dirname, '../dist/openapi.json');

fs.mkdirSync(path.dirname(outputPath), { recursive: true });

const spec = getOpenApiSpec();
fs.writeFileSync(outputPath, JSON.stringify(spec, null, 2));

const paths = 'paths' in spec && typeof spec.paths === 'object' && spec.paths !== null ? spec.paths : {};
console.log(`✅ OpenAPI spec generated: ${outputPath}`);
console.log(`   Endpoints found: ${Object.keys(paths).length}`);
