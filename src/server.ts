import { createApp } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('[Server] Starting music catalog service...');

    try {
        // 1. Load and validate configuration
        const config = loadConfig();
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('[Server] Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Create and start the app
        const app = createApp(config);

        app.listen(config.port, () => {
            console.log(`[Server] Listening on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Upstream: ${config.testMode ? 'recorded fixtures' : config.innertube.baseUrl}`);
        });
    } catch (error) {
        console.error('[Server] Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('[Server] Fatal error:', error);
    process.exit(1);
});
