import blessed from 'blessed';
import { WifiDirectManager } from './services/wifi-direct.service';
import { ConnectionInfo, PeerDevice, PeerDeviceStatus } from './interfaces/wifi-p2p.interface';
import { deviceStatusToString } from './utils/p2p-labels.util';

// Truncate text containing blessed tags to a visible width, keeping the tags intact
export function smartTruncateTagAware(text: string, maxLength: number): string {
    if (maxLength <= 0) return '';
    if (blessed.stripTags(text).length <= maxLength) {
        return text;
    }

    let truncatedText = '';
    let currentVisibleLength = 0;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === '{' && text.indexOf('}', i) !== -1) {
            const tagCloseIndex = text.indexOf('}', i);
            truncatedText += text.substring(i, tagCloseIndex + 1);
            i = tagCloseIndex;
        } else if (currentVisibleLength < maxLength) {
            truncatedText += char;
            currentVisibleLength++;
        } else {
            break;
        }
    }
    return truncatedText;
}

const statusTags: Record<PeerDeviceStatus, string> = {
    available: 'green-fg',
    invited: 'yellow-fg',
    connected: 'cyan-fg',
    failed: 'red-fg',
    unavailable: 'grey-fg',
};

// Device names come from the air; braces would be read as tags
function plain(text: string): string {
    return text.replace(/[{}]/g, '');
}

export function formatDeviceItem(device: PeerDevice): string {
    const tag = statusTags[device.status];
    return `${plain(device.deviceName) || 'Unknown device'} (${device.deviceAddress}) {${tag}}${deviceStatusToString(device.status)}{/${tag}}`;
}

export function formatConnectionPane(connected: boolean, info: ConnectionInfo | null, device: PeerDevice | null): string {
    if (!connected || !info) {
        return '{bold}Connection{/bold}\n\nStatus: {red-fg}Disconnected{/red-fg}';
    }
    let c = '{bold}Connection{/bold}\n\n';
    c += 'Status: {green-fg}Connected{/green-fg}\n';
    if (device) {
        c += `Peer: {cyan-fg}${plain(device.deviceName)}{/cyan-fg} (${device.deviceAddress})\n`;
    }
    c += `Group Owner: {yellow-fg}${info.isGroupOwner ? 'This device' : 'Peer'}{/yellow-fg}\n`;
    c += `Group Owner IP: ${info.groupOwnerAddress ?? 'Unknown'}\n`;
    return c;
}

// --- Main Application TUI ---

let screen: blessed.Widgets.Screen | null = null;
let manager: WifiDirectManager | null = null;
let statusHeaderBox: blessed.Widgets.BoxElement | null = null;
let mainMenuList: blessed.Widgets.ListElement | null = null;
let deviceList: blessed.Widgets.ListElement | null = null;
let interactionPane: blessed.Widgets.BoxElement | null = null;
let logBox: blessed.Widgets.Log | null = null;
let lastStatus = 'Status: idle';

const mainMenuTitle = 'WiFi Direct Control Panel';

const mainMenuItems = [
    'Discover Devices',
    'Stop Discovery',
    'Auto Connect',
    'Connect to Selected Device',
    'Disconnect',
    'Connection Info',
    'Group Info',
    'Exit',
];

function updateStatusHeader() {
    if (!statusHeaderBox || !manager || !screen) return;

    const state = manager.getState();
    const thisDevice = state.thisDevice ? `${plain(state.thisDevice.deviceName)} (${state.thisDevice.deviceAddress})` : 'N/A';
    const p2p = state.p2pEnabled === null ? '{grey-fg}Unknown{/grey-fg}' : state.p2pEnabled ? '{green-fg}Enabled{/green-fg}' : '{red-fg}Disabled{/red-fg}';

    let line1 = `This device: {yellow-fg}${thisDevice}{/yellow-fg} | P2P: ${p2p} | `;
    line1 += `Link: ${state.isConnected ? `{green-fg}Connected (${plain(state.connectedDevice?.deviceName ?? 'peer')}){/green-fg}` : '{red-fg}Disconnected{/red-fg}'}`;
    let line2 = `${lastStatus}${state.isDiscovering ? ' | {cyan-fg}Discovering{/cyan-fg}' : ''}`;

    const maxWidth = typeof statusHeaderBox.width === 'number' ? statusHeaderBox.width : 80;
    if (blessed.stripTags(line1).length > maxWidth) {
        line1 = smartTruncateTagAware(line1, maxWidth - 1) + '…';
    }
    if (blessed.stripTags(line2).length > maxWidth) {
        line2 = smartTruncateTagAware(line2, maxWidth - 1) + '…';
    }

    statusHeaderBox.setContent(`{center}${line1}{/center}\n{center}${line2}{/center}`);
    screen.render();
}

function showMessageInInteractionPane(title: string, message: string, type: 'info' | 'error' | 'success' = 'info') {
    if (!interactionPane || !screen) return;

    interactionPane.setLabel(` ${title} `);
    const color = type === 'error' ? '{red-fg}' : (type === 'success' ? '{green-fg}' : '{blue-fg}');
    interactionPane.setContent(`${color}${message}{/}`);
    screen.render();
}

function renderDevices(devices: readonly PeerDevice[]) {
    if (!deviceList || !screen) return;
    deviceList.setItems(devices.length === 0 ? ['{grey-fg}No devices found{/grey-fg}'] : devices.map(formatDeviceItem));
    screen.render();
}

async function connectToListedDevice(index: number) {
    if (!manager) return;
    const device = manager.getDevices()[index];
    if (!device) {
        showMessageInInteractionPane('Connect', 'Select a discovered device first.', 'error');
        return;
    }
    await manager.connectToDevice(device);
}

async function handleMenuSelection(item: blessed.Widgets.BlessedElement, index: number) {
    const selectedOption = mainMenuItems[index];
    if (!interactionPane || !screen || !manager) return;

    switch (selectedOption) {
        case 'Discover Devices':
            await manager.discoverPeers();
            break;

        case 'Stop Discovery':
            await manager.stopDiscovery();
            break;

        case 'Auto Connect':
            await manager.autoDiscoverAndConnect();
            break;

        case 'Connect to Selected Device':
            if (manager.getDevices().length === 0) {
                showMessageInInteractionPane('Connect', 'No devices yet. Run "Discover Devices" first.', 'error');
                break;
            }
            showMessageInInteractionPane('Connect', 'Pick a device in the Devices pane and press Enter.');
            deviceList?.focus();
            break;

        case 'Disconnect':
            await manager.disconnect();
            break;

        case 'Connection Info': {
            await manager.requestConnectionInfo();
            const state = manager.getState();
            interactionPane.setLabel(' Connection ');
            interactionPane.setContent(formatConnectionPane(state.isConnected, state.connectionInfo, state.connectedDevice));
            break;
        }

        case 'Group Info': {
            const group = await manager.requestGroupInfo();
            interactionPane.setLabel(' P2P Group ');
            if (!group) {
                interactionPane.setContent('{yellow-fg}No P2P group is active.{/yellow-fg}');
                break;
            }
            let c = '{bold}P2P Group{/bold}\n\n';
            c += `Network Name: {cyan-fg}${plain(group.networkName)}{/cyan-fg}\n`;
            c += `Interface: ${group.interfaceName}\n`;
            c += `Role: {yellow-fg}${group.isGroupOwner ? 'Group Owner' : 'Client'}{/yellow-fg}\n`;
            if (group.frequency) c += `Frequency: ${group.frequency} MHz\n`;
            if (group.passphrase) c += `Passphrase: ${plain(group.passphrase)}\n`;
            c += `Clients: ${group.clients.length}\n`;
            group.clients.forEach(client => {
                c += `  • ${formatDeviceItem(client)}\n`;
            });
            interactionPane.setContent(c);
            break;
        }

        case 'Exit':
            screen.emit('exit-requested');
            return;

        default:
            showMessageInInteractionPane('Warning', `Unknown option: ${selectedOption}`, 'info');
            break;
    }
    updateStatusHeader();
    mainMenuList?.focus();
}

/**
 * Run the terminal UI on an initialized manager. Resolves once the user quits;
 * shutting the manager down is left to the caller.
 */
export function launchMainTUI(wifiDirect: WifiDirectManager): Promise<void> {
    manager = wifiDirect;

    screen = blessed.screen({
        smartCSR: true,
        title: mainMenuTitle,
        fullUnicode: true,
        dockBorders: true,
    });

    statusHeaderBox = blessed.box({
        parent: screen,
        top: 0,
        left: 0,
        width: '100%',
        height: 2,
        tags: true,
        style: { fg: 'white', bg: 'blue' },
        content: '{center}Loading status...{/center}\n ',
    });

    mainMenuList = blessed.list({
        parent: screen,
        top: 2,
        left: 0,
        width: '30%',
        height: '60%-2',
        label: ' Main Menu ',
        items: mainMenuItems,
        keys: true,
        vi: true,
        mouse: true,
        border: { type: 'line' },
        style: {
            fg: 'white',
            bg: 'black',
            border: { fg: 'cyan' },
            selected: { bg: 'blue', fg: 'white', bold: true },
            item: { hover: { bg: 'green' } }
        },
        scrollbar: { ch: ' ', track: { bg: 'cyan' } },
    });

    deviceList = blessed.list({
        parent: screen,
        top: 2,
        left: '30%',
        width: '35%',
        height: '60%-2',
        label: ' Devices ',
        items: ['{grey-fg}No devices found{/grey-fg}'],
        keys: true,
        vi: true,
        mouse: true,
        tags: true,
        border: { type: 'line' },
        style: {
            fg: 'white',
            border: { fg: 'cyan' },
            selected: { bg: 'blue', fg: 'white', bold: true },
        },
        scrollbar: { ch: ' ', track: { bg: 'cyan' } },
    });

    interactionPane = blessed.box({
        parent: screen,
        top: 2,
        left: '65%',
        width: '35%',
        height: '60%-2',
        label: ' Output ',
        content: '{center}Select an option from the menu.{/center}',
        tags: true,
        border: { type: 'line' },
        style: { fg: 'white', border: { fg: 'cyan' } },
        scrollable: true,
        alwaysScroll: true,
        keys: true,
        vi: true,
    });

    logBox = blessed.log({
        parent: screen,
        top: '60%',
        left: 0,
        width: '100%',
        height: '40%',
        label: ' Log ',
        tags: true,
        border: { type: 'line' },
        style: { fg: 'white', border: { fg: 'yellow' } },
        scrollable: true,
        alwaysScroll: true,
        scrollbar: { ch: ' ', track: { bg: 'grey' } },
    });

    const removeListener = wifiDirect.addListener({
        onLog: message => {
            const color = message.startsWith('[Error]') ? 'red-fg' : message.startsWith('[Warning]') ? 'yellow-fg' : 'white-fg';
            logBox?.log(`{${color}}${plain(message)}{/${color}}`);
        },
        onDevicesChanged: renderDevices,
        onStatusChanged: status => {
            lastStatus = status;
            updateStatusHeader();
        },
        onConnectionChanged: (connected, info) => {
            const state = wifiDirect.getState();
            if (interactionPane) {
                interactionPane.setLabel(' Connection ');
                interactionPane.setContent(formatConnectionPane(connected, info, state.connectedDevice));
            }
            updateStatusHeader();
        },
        onThisDeviceChanged: () => updateStatusHeader(),
        onP2pStateChanged: () => updateStatusHeader(),
    });

    mainMenuList.on('select', (item: blessed.Widgets.BlessedElement, index: number) => {
        handleMenuSelection(item, index).catch(error => {
            showMessageInInteractionPane('Error', `${error instanceof Error ? error.message : String(error)}`, 'error');
        });
    });

    deviceList.on('select', (_item: blessed.Widgets.BlessedElement, index: number) => {
        connectToListedDevice(index)
            .then(() => {
                updateStatusHeader();
                mainMenuList?.focus();
            })
            .catch(error => {
                showMessageInInteractionPane('Error', `${error instanceof Error ? error.message : String(error)}`, 'error');
            });
    });

    deviceList.key(['escape', 'left'], () => {
        mainMenuList?.focus();
    });

    mainMenuList.focus();
    renderDevices(wifiDirect.getDevices());
    updateStatusHeader();
    logBox.log(`{blue-fg}${mainMenuTitle} started. Use arrow keys, Enter to select, q to quit.{/blue-fg}`);
    screen.render();

    return new Promise(resolve => {
        const close = () => {
            removeListener();
            screen?.destroy();
            screen = null;
            statusHeaderBox = null;
            mainMenuList = null;
            deviceList = null;
            interactionPane = null;
            logBox = null;
            manager = null;
            resolve();
        };
        screen?.key(['q', 'C-c'], close);
        screen?.once('exit-requested', close);
    });
}
