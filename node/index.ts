#!/usr/bin/env node
import readline from 'readline';
import { Node } from './Node';
import { formatNodeAddr, loadConfig, parseNodeAddr, topicFromName } from './config';
import { logger, setLogLevel } from './logger';

const utf8 = new TextEncoder();
const utf8Decoder = new TextDecoder();

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const node = await Node.persistentWithOptions(config.dataDir, {
    bindAddr: config.bindAddr,
    transport: config.transport,
    enableDocs: config.docs,
  });
  const net = node.net();
  for (const line of formatNodeAddr(net.nodeAddr())) {
    console.log(`Connect with: --connect ${line}`);
  }

  const peers = config.connect.map(parseNodeAddr);
  peers.forEach(addr => net.addNodeAddr(addr));

  const topic = topicFromName(config.topic);
  const sender = node.gossip().subscribe(
    topic,
    peers.map(p => p.peerId),
    event => {
      switch (event.type) {
        case 'delivered':
          console.log(`<${event.origin.short()}> ${utf8Decoder.decode(event.payload)}`);
          break;
        case 'peerConnected':
          console.log(`* ${event.peer.short()} joined`);
          break;
        case 'peerDisconnected':
          console.log(`* ${event.peer.short()} left`);
          break;
        case 'lagged':
          logger.warn('Missed messages: subscriber lagged');
          break;
        case 'error':
          logger.error('Gossip error:', event.message);
          break;
      }
    }
  );
  console.log(`Joined topic ${topic.toString()}`);

  const rl = readline.createInterface({ input: process.stdin });
  rl.on('line', line => {
    const text = line.trim();
    if (!text) return;
    sender.broadcast(utf8.encode(text)).catch(err => logger.error('Broadcast failed:', err));
  });

  const stop = () => {
    rl.close();
    node
      .shutdown()
      .then(() => process.exit(0))
      .catch(err => {
        logger.error('Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

main().catch(err => {
  logger.error('Failed to start node:', err);
  process.exit(1);
});
