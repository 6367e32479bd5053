import 'dotenv/config';
import { Pool } from 'pg';
import Redis from 'ioredis';
import { v7 as uuid } from 'uuid';
import { DeliveryService, ObservabilitySink, WorkflowRegistry } from '@briefline/sdk';
import { ConsoleDeliveryService } from './adapters/console-delivery.service';
import { JsonFileSignalSource } from './adapters/json-file-signal-source';
import { TemplateAnalysisService } from './adapters/template-analysis.service';
import { WebhookDeliveryService } from './adapters/webhook-delivery.service';
import { loadConfig } from './config';
import { createPool, createRedis } from './db';
import { migrate } from './db/migrate';
import { createGrpcServer, startGrpcServer, stopGrpcServer } from './grpc/server';
import { HealthProbe } from './grpc/health.service';
import {
    InMemoryRunStore,
    InMemoryWorkflowHistory,
    PgRunRepository,
    PgWorkflowHistory,
} from './repositories';
import { RunStore, WorkflowHistory } from './repositories/types';
import {
    ActivityExecutor,
    CompositeSink,
    ConsoleSink,
    DeliveryLedger,
    EventLoopMonitor,
    IdempotentDeliveryService,
    InMemoryDeliveryLedger,
    IntakeService,
    LeaderElector,
    Reaper,
    RedisDeliveryLedger,
    RedisPublishSink,
    Scheduler,
    SignalPoller,
    WorkflowEngine,
    createActivityHandlers,
} from './services';
import { OPPORTUNITY_WORKFLOW, opportunityWorkflow } from './workflows';

const TAG = '[briefline]';

const config = loadConfig();
const workerId = `worker-${uuid().slice(0, 8)}`;

// Wiring
let pool: Pool | null = null;
let redis: Redis | null = null;
let runs: RunStore;
let history: WorkflowHistory;
let ledger: DeliveryLedger;
const probes: HealthProbe[] = [];

const workflow = opportunityWorkflow();
const registry = new WorkflowRegistry();
registry.register(workflow);

// a delivery reservation lapses once its attempt's time is up
const deliverTimeoutMs = workflow.steps.find((step) => step.kind === 'deliver')?.timeoutMs;

if (config.store === 'postgres') {
    const pg = createPool(config.databaseUrl);
    const client = createRedis(config.redisUrl);
    pg.on('error', (err) => console.error(`${TAG} idle client error:`, err));
    pool = pg;
    redis = client;
    runs = new PgRunRepository(pg);
    history = new PgWorkflowHistory(pg);
    ledger = new RedisDeliveryLedger(client, { pendingTtlMs: deliverTimeoutMs, retentionMs: config.deliveryRetentionMs });
    probes.push(() => pg.query('SELECT 1'), () => client.ping());
} else {
    runs = new InMemoryRunStore();
    history = new InMemoryWorkflowHistory();
    ledger = new InMemoryDeliveryLedger({ pendingTtlMs: deliverTimeoutMs });
}

const sinks: ObservabilitySink[] = [new ConsoleSink()];
if (redis && config.eventsChannel) sinks.push(new RedisPublishSink(redis, config.eventsChannel));
const sink = new CompositeSink(...sinks);

const transport: DeliveryService = config.webhookUrl
    ? new WebhookDeliveryService({ url: config.webhookUrl })
    : new ConsoleDeliveryService();

const executor = new ActivityExecutor(
    createActivityHandlers({
        analysis: new TemplateAnalysisService(),
        delivery: new IdempotentDeliveryService(transport, ledger),
    }),
);

const engine = new WorkflowEngine(registry, runs, history);
const scheduler = new Scheduler(engine, runs, history, executor, sink, {
    maxConcurrency: config.maxConcurrency,
    tickIntervalMs: config.tickIntervalMs,
});
const intake = new IntakeService(runs, sink, {
    workflowName: OPPORTUNITY_WORKFLOW,
    threshold: config.intentThreshold,
    destination: config.destination,
});
const grpcServer = createGrpcServer({ intake, engine, runs, probes });

// Components
let poller: SignalPoller | null = null;
let reaper: Reaper | null = null;
let monitor: EventLoopMonitor | null = null;

async function main() {
    console.log(`${TAG} starting engine... (worker: ${workerId}, store: ${config.store})`);

    if (pool && redis) {
        await pool.query('SELECT 1');
        console.log(`${TAG} postgres connected`);
        await migrate(pool);

        await redis.ping();
        console.log(`${TAG} redis connected`);
    }

    await startGrpcServer(grpcServer, config.port);

    if (redis) {
        const elector = new LeaderElector(redis, { ttlSeconds: config.leaderTtlSeconds, workerId });
        reaper = new Reaper(history, elector, sink, {
            staleAfterMs: registry.maxStepTimeoutMs() + config.reaperGraceMs,
            intervalMs: config.reaperIntervalMs,
        });
        await reaper.start();
    }

    scheduler.start();

    if (config.signalFile) {
        // Backpressure
        const lagMonitor = new EventLoopMonitor();
        monitor = lagMonitor;
        const checkBackpressure = () => {
            if (scheduler.isSaturated()) {
                console.warn(`${TAG} [backpressure] all ${config.maxConcurrency} scheduler slots busy`);
                return true;
            }
            const lag = lagMonitor.lag;
            if (lag >= config.maxEventLoopLag) {
                console.warn(`${TAG} [backpressure] Event loop lag ${lag.toFixed(2)}ms >= ${config.maxEventLoopLag}ms`);
                return true;
            }
            return false;
        };

        poller = new SignalPoller(new JsonFileSignalSource(config.signalFile), {
            intervalMs: config.pollIntervalMs,
            checkBackpressure,
            onSignal: (signal) => intake.onSignal(signal),
        });
        poller.start();
    } else {
        console.log(`${TAG} SIGNAL_FILE not set; accepting pushed signals only`);
    }

    console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
    console.log(`${TAG} ${signal} received, shutting down...`);

    if (poller) await poller.stop();
    await stopGrpcServer(grpcServer);
    await scheduler.stop();
    if (reaper) await reaper.stop();
    if (monitor) monitor.disable();

    if (pool) await pool.end();
    if (redis) await redis.quit();
    console.log(`${TAG} shutdown complete`);
    process.exit(0);
}

function onSignal(signal: string) {
    shutdown(signal).catch((err) => {
        console.error(`${TAG} shutdown failed:`, err);
        process.exit(1);
    });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGUSR2', () => onSignal('SIGUSR2'));

main().catch((err) => {
    console.error(`${TAG} fatal:`, err);
    process.exit(1);
});
