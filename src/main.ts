import { ApplicationContainer } from './container/DIContainer';
import { SepticLookupServer } from './server';

async function startApplication(): Promise<void> {
  const container = new ApplicationContainer();

  try {
    // Fails here if any required secret is missing
    container.initialize();

    const server = new SepticLookupServer(container);
    await server.start();

    const shutdown = async () => {
      console.log('Received shutdown signal, gracefully shutting down...');
      try {
        await server.shutdown();
        process.exit(0);
      } catch (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown());  // Docker stop
    process.on('SIGINT', () => void shutdown());   // Ctrl+C

  } catch (error) {
    console.error('Failed to start application:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void startApplication();
