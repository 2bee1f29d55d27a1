import { loadConfig } from './config';
import { OrbitSimulationService } from './orbitSimulationService';
import { startServer } from './server';

async function main() {
    const config = loadConfig();
    const service = new OrbitSimulationService(config.system, {
        timeScale: config.timeScale,
        startTime: config.startTime,
    });
    await service.initialize();

    const server = startServer(service, config);

    process.on('SIGINT', () => {
        // eslint-disable-next-line no-console
        console.log('Interrupted, stopping the orrery.');
        server.close();
        process.exit(0);
    });
}

main().catch(err => {
    // eslint-disable-next-line no-console
    console.error('Orrery server failed to start:', err);
    process.exit(1);
});
