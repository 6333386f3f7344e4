import dotenv from 'dotenv';
import { domainImportService } from '../services/domainImportService.js';
import { redisService } from '../services/redisService.js';
import { settingsService } from '../services/settingsService.js';

dotenv.config();

async function main() {
    const root = process.argv[2] || settingsService.getDomainsPath();
    if (!root) {
        console.error('Usage: import_domains <domains-dir> (or set DOMAINS_PATH)');
        process.exitCode = 1;
        return;
    }

    const result = await domainImportService.importDirectory(root);
    for (const entry of result.imported) {
        console.log(`${entry.created ? 'created' : 'updated'} ${entry.domainId} (${entry.patterns} patterns)`);
    }
    for (const entry of result.failed) {
        console.error(`failed  ${entry.domainId}: ${entry.error}`);
    }
    if (result.failed.length > 0) process.exitCode = 1;
}

main()
    .catch((error) => {
        console.error(error);
        process.exitCode = 1;
    })
    .finally(() => redisService.disconnect());
