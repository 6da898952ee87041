/**
 * Device Manager Tools
 *
 * Device registration (real and model devices), bulk add/delete, status
 * decoding and live queries through the FortiManager device proxy.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  optionalNumber,
  optionalString,
  optionalStringArray,
  requireRecordArray,
  requireString,
  requireStringArray,
  type ToolArgs,
} from '../lib/args.js';
import { decodeDeviceStatus } from '../lib/device-status.js';
import { ValidationError } from '../lib/errors.js';
import type { FmgFilter, FmgRecord } from '../lib/fmg-client.js';
import { validateDeviceName, validateDeviceSerial, validateIpv4Address } from '../lib/validation.js';
import { adomArg, toJson, type ToolContext } from './context.js';

const adomProperty = { type: 'string', description: 'ADOM name (default: DEFAULT_ADOM)' } as const;
const deviceProperty = { type: 'string', description: 'Device name' } as const;

const CREDENTIAL_KEYS = ['adm_pass', 'adm_passwd'];

function withoutCredentials(device: FmgRecord): FmgRecord {
  return Object.fromEntries(Object.entries(device).filter(([key]) => !CREDENTIAL_KEYS.includes(key)));
}

export const deviceTools: Tool[] = [
  {
    name: 'list_device_vdoms',
    description: `List the VDOMs configured on a managed device.

Related tools:
- get_device: Full device record`,
    inputSchema: {
      type: 'object',
      properties: { device: deviceProperty, adom: adomProperty },
      required: ['device'],
    },
  },
  {
    name: 'get_device_status',
    description: `Get connection, config-sync, database and install status for devices.

Numeric status fields are decoded next to the raw value:
- conn_status_str: up, down, unknown
- conf_status_str: in_sync, out_of_sync, unknown
- db_status_str: no_changes, modified, unknown
- dev_status_str: none, checkedin, in_progress, installed, aborted, unknown

Use for:
- Pre-install checks (device up and in sync)
- Finding devices with pending database changes

Related tools:
- search_devices: Filter devices by attributes`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        device: { type: 'string', description: 'Only this device (default: all)' },
      },
    },
  },
  {
    name: 'search_devices',
    description: `Search devices by name, platform, firmware or connection state.

Text filters are substring matches. Results include decoded status fields.

Related tools:
- list_devices: Unfiltered inventory`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name_filter: { type: 'string', description: 'Name contains' },
        platform_filter: { type: 'string', description: 'Platform contains, e.g. "FortiGate-60"' },
        os_version_filter: { type: 'string', description: 'Firmware version contains, e.g. "7.4"' },
        connection_status: { type: 'string', enum: ['up', 'down'], description: 'Connection state' },
      },
    },
  },
  {
    name: 'add_device',
    description: `Register a device with FortiManager.

Two modes:
- Real device: give ip (plus admin_user/admin_pass) and FortiManager
  connects to it
- Model device: give serial_number without ip; the device is provisioned
  offline and binds when it first calls home

Admin passwords are never echoed back.

Related tools:
- add_model_device: Model device with explicit firmware version
- add_devices_bulk: Many devices at once`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: { type: 'string', description: 'Device name' },
        ip: { type: 'string', description: 'Management IP' },
        serial_number: { type: 'string', description: 'Serial number, e.g. FGVM01TM00000001' },
        admin_user: { type: 'string', description: 'Admin user on the device' },
        admin_pass: { type: 'string', description: 'Admin password on the device' },
        description: { type: 'string', description: 'Description' },
        platform: { type: 'string', description: 'Platform (default: FortiGate-VM64)' },
        mgmt_mode: { type: 'string', description: 'Management mode: fmg, faz, fmgfaz (default: fmg)' },
        flags: { type: 'array', items: { type: 'string' }, description: 'DVM flags, e.g. ["create_task"]' },
      },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'add_model_device',
    description: `Provision a model device for zero-touch deployment.

The device is created from its serial number and platform; configuration
can be prepared before the hardware is online.

Related tools:
- add_device: Register a reachable device`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: { type: 'string', description: 'Device name' },
        serial_number: { type: 'string', description: 'Serial number' },
        platform: { type: 'string', description: 'Platform (default: FortiGate-VM64)' },
        os_version: { type: 'string', description: 'Firmware major.minor (default: 7.0)' },
        description: { type: 'string', description: 'Description' },
      },
      required: ['adom', 'name', 'serial_number'],
    },
  },
  {
    name: 'delete_device',
    description: `Remove a device from FortiManager management.

Related tools:
- delete_devices_bulk: Remove many devices`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        device: deviceProperty,
        flags: { type: 'array', items: { type: 'string' }, description: 'DVM flags' },
      },
      required: ['adom', 'device'],
    },
  },
  {
    name: 'add_devices_bulk',
    description: `Register several devices in one request.

Each entry uses the DVM device fields: name, ip, sn, adm_usr, adm_pass,
platform_str, mgmt_mode. Passwords are stripped from the response.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        devices: { type: 'array', items: { type: 'object' }, description: 'Device definitions' },
        flags: { type: 'array', items: { type: 'string' }, description: 'DVM flags' },
      },
      required: ['adom', 'devices'],
    },
  },
  {
    name: 'delete_devices_bulk',
    description: `Remove several devices by name in one request.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        devices: { type: 'array', items: { type: 'string' }, description: 'Device names' },
        flags: { type: 'array', items: { type: 'string' }, description: 'DVM flags' },
      },
      required: ['adom', 'devices'],
    },
  },
  {
    name: 'update_device',
    description: `Update a device's description or map coordinates.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        device: deviceProperty,
        description: { type: 'string', description: 'Description' },
        latitude: { type: 'number', description: 'Latitude' },
        longitude: { type: 'number', description: 'Longitude' },
      },
      required: ['adom', 'device'],
    },
  },
  {
    name: 'reload_device_list',
    description: `Reload the device list for an ADOM from the device manager database.`,
    inputSchema: { type: 'object', properties: { adom: adomProperty } },
  },
  {
    name: 'get_device_realtime_status',
    description: `Query a managed FortiGate's live system status through the FortiManager proxy.

Returns what the device reports right now (version, serial, uptime), not
the FortiManager database copy.

Related tools:
- get_device_interfaces: Live interface state`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, device: deviceProperty },
      required: ['adom', 'device'],
    },
  },
  {
    name: 'get_device_interfaces',
    description: `Query a managed FortiGate's live interface status through the FortiManager proxy.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, device: deviceProperty },
      required: ['adom', 'device'],
    },
  },
];

export async function handleDeviceTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;

  switch (name) {
    case 'list_device_vdoms': {
      const device = validateDeviceName(requireString(args, 'device'));
      const vdoms = await client.listDeviceVdoms(adomArg(args, ctx), device);
      return toJson({ status: 'success', count: vdoms.length, vdoms });
    }

    case 'get_device_status': {
      const adom = adomArg(args, ctx);
      const deviceArg = optionalString(args, 'device');
      const device = deviceArg ? validateDeviceName(deviceArg) : undefined;
      const devices = (await client.getDeviceStatus(adom, device)).map(decodeDeviceStatus);
      return toJson({ status: 'success', count: devices.length, devices });
    }

    case 'search_devices': {
      const adom = adomArg(args, ctx);
      const filters: FmgFilter[] = [];
      const nameFilter = optionalString(args, 'name_filter');
      const platformFilter = optionalString(args, 'platform_filter');
      const osFilter = optionalString(args, 'os_version_filter');
      const connection = optionalString(args, 'connection_status');

      if (nameFilter) filters.push(['name', 'contain', nameFilter]);
      if (platformFilter) filters.push(['platform_str', 'contain', platformFilter]);
      if (osFilter) filters.push(['os_ver', 'contain', osFilter]);
      if (connection) filters.push(['conn_status', '==', connection.toLowerCase() === 'up' ? 1 : 2]);

      const devices = (await client.listDevices(adom, { filter: filters.length > 0 ? filters : undefined })).map(
        decodeDeviceStatus
      );
      return toJson({ status: 'success', count: devices.length, devices });
    }

    case 'add_device': {
      const adom = adomArg(args, ctx);
      const deviceName = validateDeviceName(requireString(args, 'name'));
      const ipArg = optionalString(args, 'ip');
      const serialArg = optionalString(args, 'serial_number');
      const adminUser = optionalString(args, 'admin_user');
      const adminPass = optionalString(args, 'admin_pass');
      const description = optionalString(args, 'description');
      const platform = optionalString(args, 'platform', 'FortiGate-VM64');

      const device: FmgRecord = { name: deviceName, mgmt_mode: optionalString(args, 'mgmt_mode', 'fmg') };
      if (ipArg) {
        device.ip = validateIpv4Address(ipArg);
        if (adminUser) device.adm_usr = adminUser;
        if (adminPass) device.adm_pass = adminPass;
      }
      if (serialArg) {
        device.sn = validateDeviceSerial(serialArg);
        if (!ipArg) device['device action'] = 'add_model';
      }
      if (description) device.desc = description;
      if (platform) device.platform_str = platform;

      const result = await client.addDevice(adom, device, optionalStringArray(args, 'flags'));
      return toJson({
        status: 'success',
        device: result.device ?? withoutCredentials(device),
        task_id: result.taskid,
        message: `Device ${deviceName} added successfully`,
      });
    }

    case 'add_model_device': {
      const adom = adomArg(args, ctx);
      const deviceName = validateDeviceName(requireString(args, 'name'));
      const device: FmgRecord = {
        name: deviceName,
        sn: validateDeviceSerial(requireString(args, 'serial_number')),
        platform_str: optionalString(args, 'platform', 'FortiGate-VM64'),
        os_ver: optionalString(args, 'os_version', '7.0'),
        mgmt_mode: 'fmg',
        'device action': 'add_model',
      };
      const description = optionalString(args, 'description');
      if (description) device.desc = description;

      const result = await client.addDevice(adom, device);
      return toJson({
        status: 'success',
        device: result.device ?? device,
        message: `Model device ${deviceName} added successfully`,
      });
    }

    case 'delete_device': {
      const adom = adomArg(args, ctx);
      const device = validateDeviceName(requireString(args, 'device'));
      const result = await client.deleteDevice(adom, device, optionalStringArray(args, 'flags'));
      return toJson({ status: 'success', task_id: result.taskid, message: `Device ${device} deleted successfully` });
    }

    case 'add_devices_bulk': {
      const adom = adomArg(args, ctx);
      const devices = requireRecordArray(args, 'devices');
      if (devices.length === 0) {
        throw new ValidationError('No devices provided');
      }
      const result = await client.addDeviceList(adom, devices, optionalStringArray(args, 'flags'));
      const safe = devices.map(withoutCredentials);
      return toJson({
        status: 'success',
        added_count: safe.length,
        devices: safe,
        task_id: result.taskid,
        message: `Added ${safe.length} devices`,
      });
    }

    case 'delete_devices_bulk': {
      const adom = adomArg(args, ctx);
      const names = requireStringArray(args, 'devices').map(validateDeviceName);
      if (names.length === 0) {
        throw new ValidationError('No devices provided');
      }
      const result = await client.deleteDeviceList(
        adom,
        names.map((deviceName) => ({ name: deviceName })),
        optionalStringArray(args, 'flags')
      );
      return toJson({
        status: 'success',
        deleted_count: names.length,
        task_id: result.taskid,
        message: `Deleted ${names.length} devices`,
      });
    }

    case 'update_device': {
      const adom = adomArg(args, ctx);
      const device = validateDeviceName(requireString(args, 'device'));
      const data: FmgRecord = {};
      const description = optionalString(args, 'description');
      const latitude = optionalNumber(args, 'latitude');
      const longitude = optionalNumber(args, 'longitude');
      if (description !== undefined) data.desc = description;
      if (latitude !== undefined) data.latitude = latitude;
      if (longitude !== undefined) data.longitude = longitude;
      if (Object.keys(data).length === 0) {
        throw new ValidationError('No update parameters provided');
      }
      await client.updateDevice(adom, device, data);
      return toJson({ status: 'success', message: `Device ${device} updated successfully` });
    }

    case 'reload_device_list': {
      const adom = adomArg(args, ctx);
      await client.reloadDeviceList(adom);
      return toJson({ status: 'success', message: `Device list reloaded for ADOM ${adom}` });
    }

    case 'get_device_realtime_status':
    case 'get_device_interfaces': {
      const adom = adomArg(args, ctx);
      const device = validateDeviceName(requireString(args, 'device'));
      const resource =
        name === 'get_device_interfaces' ? '/api/v2/monitor/system/interface' : '/api/v2/monitor/system/status';
      const data = await client.proxyCall('get', resource, [`/adom/${adom}/device/${device}`]);
      return toJson({ status: 'success', data });
    }

    default:
      throw new Error(`Unknown device tool: ${name}`);
  }
}
