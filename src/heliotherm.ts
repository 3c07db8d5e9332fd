import type { Node, NodeAPI, NodeDef } from "node-red";
import { loadCatalog, loadDefaultCatalog } from './catalog';
import * as CONST from './constants';
import PollingCoordinator from './coordinator';
import { createNodeLogger } from './logger';
import * as helpers from './node-helpers';
import * as utils from './utils';

interface HeliothermConfigNodeDef extends NodeDef, helpers.ConfigNodeFields { }

interface HeliothermConfigNode extends Node {
    coordinator: PollingCoordinator | null;
}

interface HeliothermNodeDef extends NodeDef {
    server: string;
    keys?: string;
}

function isConfigNode(node: Node | null | undefined): node is HeliothermConfigNode {
    return !!node && node.type === 'heliotherm-config' && 'coordinator' in node;
}

export = function (RED: NodeAPI) {
    const defaultCatalog = loadDefaultCatalog();

    // --- Admin API ---
    RED.httpAdmin.get(`${CONST.ADMIN_ROOT}/registers`, RED.auth.needsPermission('heliotherm.read'), function (req, res) {
        res.json(defaultCatalog.entries().map(({ key, descriptor }) => ({ key, ...descriptor })));
    });

    /**
     * One coordinator (and one TCP connection) per configured heat pump
     */
    function HeliothermConfigNode(this: HeliothermConfigNode, config: HeliothermConfigNodeDef) {
        RED.nodes.createNode(this, config);
        const node = this;
        node.coordinator = null;

        let coordinator: PollingCoordinator;
        try {
            const catalog = config.catalogFile ? loadCatalog(config.catalogFile) : defaultCatalog;
            coordinator = new PollingCoordinator({
                config: helpers.toHeliothermConfig(config),
                catalog,
                logger: createNodeLogger(node),
            });
        } catch (e) {
            node.error(`Invalid heat pump configuration: ${utils.describeError(e)}`);
            return;
        }

        node.coordinator = coordinator;
        coordinator.start().then((result) => {
            if (!result.ok) node.warn(`First read failed: ${result.error.message}`);
        }, (err: unknown) => node.error(`Polling failed to start: ${utils.describeError(err)}`));

        node.on('close', (removed: boolean, done: () => void) => {
            coordinator.close().then(done, (err: unknown) => {
                node.error(`Error while closing: ${utils.describeError(err)}`);
                done();
            });
        });
    }

    /**
     * Emits snapshots and takes refresh/write requests
     */
    function HeliothermNode(this: Node, config: HeliothermNodeDef) {
        RED.nodes.createNode(this, config);
        const node = this;

        const server = RED.nodes.getNode(config.server);
        if (!isConfigNode(server) || !server.coordinator) {
            node.status({ fill: "red", shape: "ring", text: "not configured" });
            node.error('Heat pump connection is missing or invalid');
            return;
        }

        const coordinator = server.coordinator;
        const keys = utils.parseKeyList(config.keys);
        for (const key of keys ?? []) {
            if (!coordinator.catalog.has(key)) node.warn(`Unknown register "${key}" will never be reported`);
        }

        const initial = coordinator.currentSnapshot();
        node.status(helpers.stateBadge(initial.state, initial.consecutiveFailures, initial.snapshot));

        const unsubscribe = coordinator.subscribe((event) => {
            const status = coordinator.currentSnapshot();
            node.status(helpers.stateBadge(status.state, status.consecutiveFailures, status.snapshot));

            if (event.type === 'snapshot') {
                node.send(helpers.snapshotMessage(event.snapshot, keys));
            } else if (event.type === 'persistent-failure') {
                node.warn(`Heat pump unreachable after ${event.consecutiveFailures} cycles: ${event.error.message}`);
            }
        });

        node.on('input', (msg, send, done) => {
            if (msg.topic === 'refresh') {
                node.status({ fill: "blue", shape: "dot", text: "refreshing..." });
                coordinator.requestRefresh().then((result) => {
                    if (result.ok) done();
                    else done(result.error);
                }, done);
                return;
            }

            const request = helpers.parseWriteRequest(msg.payload);
            if (!request) {
                done(new Error('Expected msg.topic "refresh" or msg.payload { key, value }'));
                return;
            }

            node.status({ fill: "yellow", shape: "dot", text: `writing ${request.key}...` });
            coordinator.write(request.key, request.value).then((result) => {
                if (!result.ok) {
                    const status = coordinator.currentSnapshot();
                    node.status(helpers.stateBadge(status.state, status.consecutiveFailures, status.snapshot));
                    done(result.error);
                    return;
                }
                send({ ...msg, topic: 'write', payload: { key: request.key, value: request.value, refreshed: result.refresh.ok } });
                done();
            }, done);
        });

        node.on('close', (removed: boolean, done: () => void) => {
            unsubscribe();
            done();
        });
    }

    RED.nodes.registerType("heliotherm-config", HeliothermConfigNode);
    RED.nodes.registerType("heliotherm", HeliothermNode);
}
