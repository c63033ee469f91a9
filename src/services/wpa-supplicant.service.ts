import * as dbus from 'dbus-next';
import * as os from 'os';
import {
  ConnectionInfo,
  GroupInfo,
  P2pBroadcast,
  P2pBroadcastHandler,
  P2pConnectConfig,
  P2pRequestError,
  PeerDevice,
  PeerDeviceStatus,
  PlatformUnsupportedError,
  WifiP2pService,
  WifiP2pServiceProvider,
} from '../interfaces/wifi-p2p.interface';
import { executeCommand } from '../utils/command.util';
import { errorMessage } from '../utils/error.util';
import {
  addressToPeerPath,
  bytesOf,
  dictOf,
  formatMacAddress,
  formatPrimaryDeviceType,
  numberOf,
  parseGatewayFromRoutes,
  peerPathToAddress,
  reasonFromDBusError,
  stringArrayOf,
  stringOf,
} from '../utils/wpa-dbus.util';

const WPA_SERVICE = 'fi.w1.wpa_supplicant1';
const WPA_PATH = '/fi/w1/wpa_supplicant1';
const IFACE = 'fi.w1.wpa_supplicant1.Interface';
const P2P_DEVICE_IFACE = 'fi.w1.wpa_supplicant1.Interface.P2PDevice';
const PEER_IFACE = 'fi.w1.wpa_supplicant1.Peer';
const GROUP_IFACE = 'fi.w1.wpa_supplicant1.Group';
const PROPERTIES_IFACE = 'org.freedesktop.DBus.Properties';
const NO_OBJECT = '/';

type ClientInterface = ReturnType<dbus.ProxyObject['getInterface']>;

/**
 * WiFi Direct through wpa_supplicant's D-Bus API
 */
export class WpaSupplicantP2pService implements WifiP2pService {
  private groupInterfacePath: string | null = null;
  private invitedAddress: string | null = null;
  private failedAddress: string | null = null;

  private constructor(
    private readonly bus: dbus.MessageBus,
    private readonly interfacePath: string,
    private readonly p2p: ClientInterface,
    private readonly props: ClientInterface,
  ) {}

  /**
   * Attach to the P2P device of a wireless interface
   * @throws PlatformUnsupportedError when wpa_supplicant or its P2P support is missing
   */
  static async connect(interfaceName: string): Promise<WpaSupplicantP2pService> {
    const bus = dbus.systemBus();
    try {
      const root = await bus.getProxyObject(WPA_SERVICE, WPA_PATH);
      const supplicant = root.getInterface(WPA_SERVICE);
      const interfacePath = stringOf(await supplicant.GetInterface(interfaceName));
      if (!interfacePath) {
        throw new Error(`wpa_supplicant does not manage ${interfaceName}`);
      }

      const device = await bus.getProxyObject(WPA_SERVICE, interfacePath);
      let p2p: ClientInterface;
      try {
        p2p = device.getInterface(P2P_DEVICE_IFACE);
      } catch {
        throw new PlatformUnsupportedError(`${interfaceName} does not support WiFi Direct`);
      }
      const service = new WpaSupplicantP2pService(bus, interfacePath, p2p, device.getInterface(PROPERTIES_IFACE));
      // A group formed before this process started is only known to the daemon
      service.groupInterfacePath = await service.findGroupInterface();
      return service;
    } catch (error) {
      bus.disconnect();
      if (error instanceof PlatformUnsupportedError) throw error;
      throw new PlatformUnsupportedError(`WiFi Direct is not available: ${errorMessage(error)}`);
    }
  }

  async discoverPeers(): Promise<void> {
    await this.call(() => this.p2p.Find({}));
  }

  async stopPeerDiscovery(): Promise<void> {
    await this.call(() => this.p2p.StopFind());
  }

  async requestPeers(): Promise<PeerDevice[]> {
    const paths = stringArrayOf(await this.call(() => this.getDeviceProperty('Peers')));
    const members = new Set(await this.groupMembers());

    const devices: PeerDevice[] = [];
    for (const path of paths) {
      try {
        devices.push(await this.readPeer(path, members));
      } catch (error) {
        // Peers can vanish between listing and reading
        console.error(`Failed to read peer ${path}:`, errorMessage(error));
      }
    }
    return devices;
  }

  async connect(config: P2pConnectConfig): Promise<void> {
    this.invitedAddress = config.deviceAddress;
    this.failedAddress = null;
    await this.call(() => this.p2p.Connect({
      peer: new dbus.Variant('o', addressToPeerPath(this.interfacePath, config.deviceAddress)),
      wps_method: new dbus.Variant('s', config.wps),
      go_intent: new dbus.Variant('i', config.groupOwnerIntent),
    }));
  }

  async removeGroup(): Promise<void> {
    const groupDevice = await this.groupDeviceInterface();
    await this.call(() => groupDevice.Disconnect());
  }

  async cancelConnect(): Promise<void> {
    this.invitedAddress = null;
    await this.call(() => this.p2p.Cancel());
  }

  async requestConnectionInfo(): Promise<ConnectionInfo | null> {
    const groupPath = stringOf(await this.call(() => this.getDeviceProperty('Group')), NO_OBJECT);
    const role = stringOf(await this.call(() => this.getDeviceProperty('Role')));

    if (groupPath === NO_OBJECT || role === 'device') {
      return { groupFormed: false, isGroupOwner: false, groupOwnerAddress: null };
    }

    const isGroupOwner = role === 'GO';
    const ifname = await this.groupInterfaceName();
    return {
      groupFormed: true,
      isGroupOwner,
      groupOwnerAddress: isGroupOwner ? localIPv4(ifname) : await gatewayOf(ifname),
    };
  }

  async requestGroupInfo(): Promise<GroupInfo | null> {
    const groupPath = stringOf(await this.call(() => this.getDeviceProperty('Group')), NO_OBJECT);
    if (groupPath === NO_OBJECT) return null;

    const group = await this.bus.getProxyObject(WPA_SERVICE, groupPath);
    const groupProps = group.getInterface(PROPERTIES_IFACE);
    const all = dictOf(await this.call(() => groupProps.GetAll(GROUP_IFACE)));

    const memberPaths = stringArrayOf(all.get('Members'));
    const members = new Set(memberPaths);
    const clients: PeerDevice[] = [];
    for (const path of memberPaths) {
      try {
        clients.push(await this.readPeer(path, members));
      } catch (error) {
        console.error(`Failed to read group member ${path}:`, errorMessage(error));
      }
    }

    const passphrase = stringOf(all.get('Passphrase'));
    return {
      networkName: Buffer.from(bytesOf(all.get('SSID'))).toString(),
      passphrase: passphrase || undefined,
      interfaceName: await this.groupInterfaceName(),
      frequency: numberOf(all.get('Frequency')),
      isGroupOwner: stringOf(all.get('Role')) === 'GO',
      clients,
    };
  }

  registerReceiver(handler: P2pBroadcastHandler): () => void {
    const dispatch = (broadcast: P2pBroadcast) => {
      Promise.resolve(handler(broadcast)).catch(error => {
        console.error(`Error handling ${broadcast.action} broadcast:`, error);
      });
    };

    const onPeersChanged = () => dispatch({ action: 'peers-changed' });
    const onGroupStarted = (properties: unknown) => {
      const started = dictOf(properties);
      this.groupInterfacePath = stringOf(started.get('interface_object')) || null;
      this.invitedAddress = null;
      dispatch({ action: 'connection-changed', networkInfo: { isConnected: true } });
    };
    const onGroupFinished = () => {
      this.groupInterfacePath = null;
      dispatch({ action: 'connection-changed', networkInfo: { isConnected: false } });
    };
    const onNegotiationFailure = (properties: unknown) => {
      this.failedAddress = peerPathToAddress(stringOf(dictOf(properties).get('peer_object'))) || this.invitedAddress;
      this.invitedAddress = null;
      dispatch({ action: 'connection-changed', networkInfo: { isConnected: false } });
      dispatch({ action: 'peers-changed' });
    };
    const onFormationFailure = () => {
      this.failedAddress = this.invitedAddress;
      this.invitedAddress = null;
      dispatch({ action: 'connection-changed', networkInfo: null });
    };
    const onPropertiesChanged = (iface: unknown, changed: unknown) => {
      if (iface !== P2P_DEVICE_IFACE || !dictOf(changed).has('P2PDeviceConfig')) return;
      this.readThisDevice()
        .then(device => dispatch({ action: 'this-device-changed', device }))
        .catch(error => console.error('Failed to read this device:', errorMessage(error)));
    };

    this.p2p.on('DeviceFound', onPeersChanged);
    this.p2p.on('DeviceLost', onPeersChanged);
    this.p2p.on('GroupStarted', onGroupStarted);
    this.p2p.on('GroupFinished', onGroupFinished);
    this.p2p.on('GONegotiationFailure', onNegotiationFailure);
    this.p2p.on('GroupFormationFailure', onFormationFailure);
    this.props.on('PropertiesChanged', onPropertiesChanged);

    // wpa_supplicant only exposes the P2P device while P2P is usable
    dispatch({ action: 'state-changed', state: 'enabled' });
    this.readThisDevice()
      .then(device => dispatch({ action: 'this-device-changed', device }))
      .catch(error => console.error('Failed to read this device:', errorMessage(error)));

    return () => {
      this.p2p.removeListener('DeviceFound', onPeersChanged);
      this.p2p.removeListener('DeviceLost', onPeersChanged);
      this.p2p.removeListener('GroupStarted', onGroupStarted);
      this.p2p.removeListener('GroupFinished', onGroupFinished);
      this.p2p.removeListener('GONegotiationFailure', onNegotiationFailure);
      this.p2p.removeListener('GroupFormationFailure', onFormationFailure);
      this.props.removeListener('PropertiesChanged', onPropertiesChanged);
    };
  }

  async close(): Promise<void> {
    this.bus.disconnect();
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new P2pRequestError(reasonFromDBusError(error), errorMessage(error));
    }
  }

  private getDeviceProperty(name: string): Promise<unknown> {
    return this.props.Get(P2P_DEVICE_IFACE, name);
  }

  /**
   * Path of the interface the current group runs on: the managed interface
   * whose P2P device reports the same group as ours
   */
  private async findGroupInterface(): Promise<string | null> {
    const groupPath = stringOf(await this.getDeviceProperty('Group'), NO_OBJECT);
    if (groupPath === NO_OBJECT) return null;

    const root = await this.bus.getProxyObject(WPA_SERVICE, WPA_PATH);
    const interfaces: unknown = await root.getInterface(PROPERTIES_IFACE).Get(WPA_SERVICE, 'Interfaces');
    for (const path of stringArrayOf(interfaces)) {
      if (path === this.interfacePath) continue;
      try {
        const candidate = await this.bus.getProxyObject(WPA_SERVICE, path);
        const group: unknown = await candidate.getInterface(PROPERTIES_IFACE).Get(P2P_DEVICE_IFACE, 'Group');
        if (stringOf(group) === groupPath) return path;
      } catch (error) {
        console.error(`Failed to inspect interface ${path}:`, errorMessage(error));
      }
    }
    return this.interfacePath;
  }

  private async currentGroupInterface(): Promise<string> {
    if (!this.groupInterfacePath) {
      this.groupInterfacePath = await this.findGroupInterface();
    }
    return this.groupInterfacePath ?? this.interfacePath;
  }

  private async readPeer(path: string, members: ReadonlySet<string>): Promise<PeerDevice> {
    const peer = await this.bus.getProxyObject(WPA_SERVICE, path);
    const peerProps = peer.getInterface(PROPERTIES_IFACE);
    const all = dictOf(await peerProps.GetAll(PEER_IFACE));

    const addressBytes = bytesOf(all.get('DeviceAddress'));
    const deviceAddress = addressBytes.length === 6 ? formatMacAddress(addressBytes) : peerPathToAddress(path);
    return {
      deviceName: stringOf(all.get('DeviceName')),
      deviceAddress,
      primaryDeviceType: formatPrimaryDeviceType(bytesOf(all.get('PrimaryDeviceType'))),
      status: this.peerStatus(path, deviceAddress, members),
    };
  }

  private peerStatus(path: string, address: string, members: ReadonlySet<string>): PeerDeviceStatus {
    if (members.has(path)) return 'connected';
    if (address === this.invitedAddress) return 'invited';
    if (address === this.failedAddress) return 'failed';
    return 'available';
  }

  private async readThisDevice(): Promise<PeerDevice | null> {
    const config = dictOf(await this.getDeviceProperty('P2PDeviceConfig'));
    const ifaceProps = (await this.bus.getProxyObject(WPA_SERVICE, this.interfacePath)).getInterface(PROPERTIES_IFACE);
    const ifname = stringOf(await ifaceProps.Get(IFACE, 'Ifname'));
    const address = os.networkInterfaces()[ifname]?.find(entry => entry.mac !== '00:00:00:00:00:00')?.mac;
    if (!address) return null;

    return {
      deviceName: stringOf(config.get('DeviceName')),
      deviceAddress: address,
      primaryDeviceType: formatPrimaryDeviceType(bytesOf(config.get('PrimaryDeviceType'))),
      status: this.groupInterfacePath ? 'connected' : 'available',
    };
  }

  private async groupMembers(): Promise<string[]> {
    const groupPath = stringOf(await this.call(() => this.getDeviceProperty('Group')), NO_OBJECT);
    if (groupPath === NO_OBJECT) return [];
    const group = await this.bus.getProxyObject(WPA_SERVICE, groupPath);
    const members: unknown = await group.getInterface(PROPERTIES_IFACE).Get(GROUP_IFACE, 'Members');
    return stringArrayOf(members);
  }

  // The group runs on its own interface (p2p-wlan0-0) unless the driver shares it
  private async groupDeviceInterface(): Promise<ClientInterface> {
    const path = await this.call(() => this.currentGroupInterface());
    if (path === this.interfacePath) return this.p2p;
    const groupIface = await this.bus.getProxyObject(WPA_SERVICE, path);
    return groupIface.getInterface(P2P_DEVICE_IFACE);
  }

  private async groupInterfaceName(): Promise<string> {
    const path = await this.currentGroupInterface();
    const iface = await this.bus.getProxyObject(WPA_SERVICE, path);
    const ifname: unknown = await iface.getInterface(PROPERTIES_IFACE).Get(IFACE, 'Ifname');
    return stringOf(ifname);
  }
}

function localIPv4(ifname: string): string | null {
  const entry = os.networkInterfaces()[ifname]?.find(e => e.family === 'IPv4' && !e.internal);
  return entry?.address ?? null;
}

async function gatewayOf(ifname: string): Promise<string | null> {
  try {
    const { stdout } = await executeCommand('ip', ['-4', 'route', 'show', 'dev', ifname]);
    return parseGatewayFromRoutes(stdout);
  } catch (error) {
    console.error(`Failed to read routes of ${ifname}:`, errorMessage(error));
    return null;
  }
}

export function createWpaSupplicantProvider(interfaceName: string): WifiP2pServiceProvider {
  return () => WpaSupplicantP2pService.connect(interfaceName);
}
