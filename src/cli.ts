#!/usr/bin/env node
import { program } from 'commander';
import { WifiDirectManager, ShutdownOptions } from './services/wifi-direct.service';
import { createWpaSupplicantProvider } from './services/wpa-supplicant.service';
import { createSimulatedProvider } from './services/simulated-p2p.service';
import { sleep, waitForConnection, waitForPeer } from './services/wifi-direct-session.service';
import { ConfigManager, WifiDirectConfig, isConfigKey } from './utils/config.util';
import {
  colorize,
  formatConnectionInfo,
  formatGroupInfo,
  formatPeerLine,
  formatSectionHeader,
  formatStatusLine,
  generateGroupQR,
} from './utils/display.util';
import { errorMessage } from './utils/error.util';
import { launchMainTUI } from './tui';

interface GlobalOptions {
  simulate?: boolean;
  interface?: string;
  verbose?: boolean;
}

const configManager = new ConfigManager();

function fail(message: string): void {
  console.error(colorize(message, 'red'));
  process.exitCode = 1;
}

// wpa_supplicant only answers P2P calls from root by default
function warnIfNotRoot(): void {
  if (typeof process.getuid === 'function' && process.getuid() !== 0) {
    console.warn(colorize('Warning: not running as root, wpa_supplicant may refuse WiFi Direct requests.', 'yellow'));
  }
}

function timeoutSeconds(value: string | undefined, fallback: number): number | null {
  const seconds = Number(value ?? fallback);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    fail(`Invalid timeout '${value}'`);
    return null;
  }
  return seconds;
}

/**
 * Run an action against an initialized manager and shut it down afterwards
 */
async function withManager(
  action: (manager: WifiDirectManager, config: WifiDirectConfig) => Promise<void>,
  shutdownOptions: ShutdownOptions = {}
): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const config = await configManager.load();
  const verbose = options.verbose ?? config.verbose;

  if (!options.simulate) warnIfNotRoot();
  const provider = options.simulate
    ? createSimulatedProvider()
    : createWpaSupplicantProvider(options.interface ?? config.interfaceName);

  const manager = new WifiDirectManager(provider, { groupOwnerIntent: config.groupOwnerIntent, verbose });
  const removeListener = manager.addListener({
    onLog: message => {
      if (!verbose && message.startsWith('[Error]')) console.error(colorize(message, 'red'));
    },
    onStatusChanged: status => {
      if (verbose) console.log(colorize(status, 'yellow'));
    },
  });

  if (!(await manager.initialize())) {
    removeListener();
    fail('WiFi Direct is not available on this device');
    return;
  }
  manager.registerReceiver();

  try {
    await action(manager, config);
  } finally {
    await manager.shutdown(shutdownOptions);
    removeListener();
  }
}

// Keep the group up until the user stops us or the peer goes away
async function holdConnection(manager: WifiDirectManager): Promise<void> {
  console.log(colorize('\nConnected. Press Ctrl+C to disconnect.', 'dim'));

  let removeListener = () => {};
  let onSignal = () => {};
  await new Promise<void>(resolve => {
    onSignal = () => resolve();
    removeListener = manager.addListener({
      onConnectionChanged: connected => {
        if (!connected) resolve();
      },
    });
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });

  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
  removeListener();
}

function printConnection(manager: WifiDirectManager): void {
  const state = manager.getState();
  console.log(formatSectionHeader('WIFI DIRECT CONNECTION'));
  formatConnectionInfo(state.isConnected, state.connectionInfo, state.connectedDevice).forEach(line => console.log(line));
}

program
  .name('wifi-direct')
  .description('WiFi Direct (P2P) control from the command line')
  .version('1.0.0')
  .option('--simulate', 'Use an in-process simulated WiFi Direct stack')
  .option('-i, --interface <name>', 'Wireless interface managed by wpa_supplicant')
  .option('-v, --verbose', 'Print every WiFi Direct log line');

program
  .command('interactive')
  .alias('i')
  .description('Start the terminal UI')
  .action(async () => {
    await withManager(manager => launchMainTUI(manager));
  });

program
  .command('discover')
  .description('Search for nearby WiFi Direct devices')
  .option('-t, --timeout <seconds>', 'How long to search')
  .action(async (options: { timeout?: string }) => {
    await withManager(async (manager, config) => {
      const seconds = timeoutSeconds(options.timeout, config.discoveryTimeout);
      if (seconds === null) return;
      console.log(`Searching for devices for ${seconds}s...`);
      await manager.discoverPeers();
      if (!manager.getState().isDiscovering) {
        fail('Peer discovery could not be started');
        return;
      }

      await sleep(seconds * 1000);
      await manager.stopDiscovery();

      const devices = manager.getDevices();
      if (devices.length === 0) {
        console.log('No devices found.');
        return;
      }
      console.log('\nNearby Devices:');
      devices.forEach((device, i) => console.log(formatPeerLine(device, i)));
    });
  });

program
  .command('connect <address>')
  .description('Connect to a device by its P2P address (push-button pairing)')
  .option('-t, --timeout <seconds>', 'How long to wait for the device and the group')
  .action(async (address: string, options: { timeout?: string }) => {
    await withManager(async (manager, config) => {
      const seconds = timeoutSeconds(options.timeout, config.discoveryTimeout);
      if (seconds === null) return;
      const timeoutMs = seconds * 1000;

      await manager.discoverPeers();
      console.log(`Looking for ${address}...`);
      const device = await waitForPeer(manager, address, timeoutMs);
      if (!device) {
        fail(`Device ${address} was not found`);
        return;
      }

      const connected = waitForConnection(manager, timeoutMs);
      await manager.connectToDevice(device);
      if (!manager.getState().connectedDevice) {
        fail(`Connection request to ${device.deviceName} was rejected`);
        return;
      }

      console.log(`Waiting for ${device.deviceName} to accept...`);
      if (!(await connected)) {
        fail('The group was not formed in time');
        return;
      }
      printConnection(manager);
      await holdConnection(manager);
    });
  });

program
  .command('auto')
  .description('Discover devices and connect to the first available one')
  .option('-t, --timeout <seconds>', 'How long to wait for a connection')
  .action(async (options: { timeout?: string }) => {
    await withManager(async (manager, config) => {
      const seconds = timeoutSeconds(options.timeout, config.discoveryTimeout);
      if (seconds === null) return;
      const timeoutMs = seconds * 1000;
      const connected = waitForConnection(manager, timeoutMs);

      await manager.autoDiscoverAndConnect();
      console.log('Searching and connecting...');
      if (!(await connected)) {
        fail('No connection was established');
        return;
      }
      printConnection(manager);
      await holdConnection(manager);
    });
  });

program
  .command('disconnect')
  .description('Leave or remove the current WiFi Direct group')
  .action(async () => {
    await withManager(async manager => {
      let lastStatus = '';
      const removeListener = manager.addListener({
        onStatusChanged: status => {
          lastStatus = status;
        },
      });
      await manager.disconnect();
      removeListener();

      if (lastStatus !== 'Status: disconnected') {
        fail('Disconnect failed');
        return;
      }
      console.log(formatStatusLine('Status', 'Disconnected', 'disconnected', 'red'));
    });
  });

program
  .command('status')
  .description('Show the current WiFi Direct connection')
  .action(async () => {
    await withManager(async manager => {
      await manager.requestConnectionInfo();
      printConnection(manager);
      const thisDevice = manager.getState().thisDevice;
      if (thisDevice) {
        console.log(formatStatusLine('This Device', `${thisDevice.deviceName} (${thisDevice.deviceAddress})`, 'peer'));
      }
    }, { disconnect: false });
  });

program
  .command('group')
  .description('Show the current P2P group')
  .option('--qr', 'Print a QR code legacy WiFi clients can scan to join the group')
  .action(async (options: { qr?: boolean }) => {
    await withManager(async manager => {
      const group = await manager.requestGroupInfo();
      if (!group) {
        console.log('No P2P group is active.');
        return;
      }
      console.log(formatSectionHeader('P2P GROUP'));
      formatGroupInfo(group).forEach(line => console.log(line));

      if (options.qr) {
        if (!group.isGroupOwner || !group.passphrase) {
          fail('Only the group owner can share the group credentials');
          return;
        }
        await generateGroupQR(group);
      }
    }, { disconnect: false });
  });

const configCommand = program
  .command('config')
  .description('Show or change settings');

configCommand
  .command('show')
  .description('Print the current settings')
  .action(async () => {
    const config = await configManager.load();
    console.log(formatSectionHeader('SETTINGS'));
    console.log(colorize(configManager.getConfigPath(), 'dim'));
    for (const [key, value] of Object.entries(config)) {
      console.log(formatStatusLine(key, String(value)));
    }
  });

configCommand
  .command('set <key> <value>')
  .description('Change a setting (interfaceName, groupOwnerIntent, discoveryTimeout, verbose)')
  .action(async (key: string, value: string) => {
    if (!isConfigKey(key)) {
      fail(`Unknown setting '${key}'`);
      return;
    }
    try {
      const config = await configManager.set(key, value);
      console.log(formatStatusLine(key, String(config[key]), 'connected', 'green'));
    } catch (error) {
      fail(errorMessage(error));
    }
  });

program.parseAsync(process.argv).catch(error => {
  fail(`Unexpected error: ${errorMessage(error)}`);
});
