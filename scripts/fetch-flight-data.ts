/**
 * Download the flight route datasets
 *
 * Run: npm run data
 *
 * Fetches the OpenGeos airline routes CSV and airports GeoJSON, trims the
 * routes table to the columns the explorer draws, and writes both into
 * public/data/ where the app loads them from.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { trimRoutesCsv } from "../src/lib/data/routes";
import { parseAirportsGeoJson } from "../src/lib/data/airports";

const ROUTE_URL =
	"https://github.com/opengeos/datasets/releases/download/world/airport_routes.csv";
const AIRPORT_URL =
	"https://github.com/opengeos/datasets/releases/download/world/airports.geojson";

const OUTPUT_DIR = join("public", "data");

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

async function download(url: string): Promise<string> {
	console.log(`📥 Downloading ${url}...`);
	const response = await fetch(url);
	if (!response.ok) {
		throw new Error(`Failed to download ${url}: ${response.status} ${response.statusText}`);
	}
	return response.text();
}

async function save(fileName: string, content: string): Promise<void> {
	const path = join(OUTPUT_DIR, fileName);
	await writeFile(path, content, "utf-8");
	console.log(`   ✅ ${path} (${formatBytes(Buffer.byteLength(content))})`);
}

async function main() {
	console.log("🚀 Fetching flight route datasets\n");

	await mkdir(OUTPUT_DIR, { recursive: true });

	const routesCsv = trimRoutesCsv(await download(ROUTE_URL));
	await save("airport_routes.csv", routesCsv);

	const airportsText = await download(AIRPORT_URL);
	const { airports, skipped } = parseAirportsGeoJson(JSON.parse(airportsText));
	console.log(`   ${airports.length} airports (${skipped} features without a code or point)`);
	await save("airports.geojson", airportsText);

	console.log("\n✨ Data ready. Start the app with npm run dev");
}

main().catch((error: unknown) => {
	console.error("❌ Failed to fetch flight data:", error);
	process.exit(1);
});
