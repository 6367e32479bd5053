import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { ReflectionService } from '@grpc/reflection';
import path from 'path';
import { RunStore } from '../repositories/types';
import { IntakeService } from '../services/intake.service';
import { WorkflowEngine } from '../services/workflow-engine';
import { HealthProbe, HealthService } from './health.service';
import { SignalIntakeService } from './intake.service';

const PROTO_DIR = path.join(__dirname, '../../../..', 'packages/proto');
const HEALTH_PROTO_PATH = path.join(PROTO_DIR, 'health.service.proto');
const INTAKE_PROTO_PATH = path.join(PROTO_DIR, 'intake.service.proto');

const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

type GrpcNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

function isNamespace(node: GrpcNode | undefined): node is grpc.GrpcObject {
    return typeof node === 'object' && node !== null && !('format' in node);
}

/** Resolves a fully qualified service name such as `grpc.health.v1.Health`. */
export function lookupService(root: grpc.GrpcObject, qualifiedName: string): grpc.ServiceDefinition {
    const parts = qualifiedName.split('.');
    const serviceName = parts.pop() ?? '';

    let scope = root;
    for (const part of parts) {
        const next: GrpcNode | undefined = scope[part];
        if (!isNamespace(next)) throw new Error(`package ${part} of ${qualifiedName} not found`);
        scope = next;
    }

    const ctor: GrpcNode | undefined = scope[serviceName];
    if (typeof ctor !== 'function') throw new Error(`service ${qualifiedName} not found`);
    return ctor.service;
}

export interface GrpcServerDeps {
    intake: IntakeService;
    engine: WorkflowEngine;
    runs: RunStore;
    probes?: HealthProbe[];
}

export function createGrpcServer(deps: GrpcServerDeps): grpc.Server {
    const healthPackageDef = protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions);
    const intakePackageDef = protoLoader.loadSync(INTAKE_PROTO_PATH, protoOptions);

    const server = new grpc.Server({
        'grpc.max_receive_message_length': 4 * 1024 * 1024,
        'grpc.max_send_message_length': 4 * 1024 * 1024,
        'grpc.keepalive_time_ms': 30000,
        'grpc.keepalive_timeout_ms': 10000,
        'grpc.keepalive_permit_without_calls': 1,
    });

    const healthService = new HealthService(deps.probes);
    server.addService(lookupService(grpc.loadPackageDefinition(healthPackageDef), 'grpc.health.v1.Health'), {
        check: healthService.check.bind(healthService),
        watch: healthService.watch.bind(healthService),
    });

    const intakeService = new SignalIntakeService(deps.intake, deps.engine, deps.runs);
    server.addService(lookupService(grpc.loadPackageDefinition(intakePackageDef), 'briefline.SignalIntake'), {
        submitSignal: intakeService.submitSignal.bind(intakeService),
        getRun: intakeService.getRun.bind(intakeService),
        cancelRun: intakeService.cancelRun.bind(intakeService),
    });

    // reflection for grpcurl debugging
    const reflectionService = new ReflectionService({
        ...healthPackageDef,
        ...intakePackageDef,
    });
    reflectionService.addToServer(server);

    return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
            if (err) {
                reject(err);
            } else {
                console.log(`[briefline] grpc server listening on port ${boundPort}`);
                resolve(boundPort);
            }
        });
    });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
    return new Promise((resolve) => server.tryShutdown(() => resolve()));
}
