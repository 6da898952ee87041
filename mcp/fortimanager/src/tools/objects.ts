/**
 * Firewall Object Tools
 *
 * Addresses (subnet, host, FQDN, range), address groups, custom services
 * and service groups in an ADOM's object database.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  optionalInteger,
  optionalString,
  optionalStringArray,
  requireString,
  requireStringArray,
  type ToolArgs,
} from '../lib/args.js';
import { isDuplicateError, isObjectInUseError, ObjectError, ValidationError } from '../lib/errors.js';
import type { FmgFilter, FmgRecord } from '../lib/fmg-client.js';
import {
  parseSubnet,
  validateAddressType,
  validateFqdn,
  validateIpv4Address,
  validateObjectName,
  validatePortRange,
} from '../lib/validation.js';
import { adomArg, toJson, type ToolContext } from './context.js';

const adomProperty = { type: 'string', description: 'ADOM name (default: DEFAULT_ADOM)' } as const;
const nameProperty = { type: 'string', description: 'Object name' } as const;
const commentProperty = { type: 'string', description: 'Comment' } as const;
const membersProperty = { type: 'array', items: { type: 'string' }, description: 'Member object names' } as const;
const nameFilterProperty = { type: 'string', description: 'Name contains' } as const;

function objectSchema(properties: Record<string, unknown>, required: string[]): Tool['inputSchema'] {
  return { type: 'object', properties: { adom: adomProperty, ...properties }, required };
}

export const objectTools: Tool[] = [
  // Addresses
  {
    name: 'list_addresses',
    description: `List firewall address objects.

Related tools:
- search_objects: Search addresses, groups and services together`,
    inputSchema: objectSchema(
      {
        name_filter: nameFilterProperty,
        type_filter: { type: 'string', description: 'Address type: ipmask, fqdn, iprange, wildcard, geography, mac' },
      },
      []
    ),
  },
  {
    name: 'get_address',
    description: `Get one firewall address object.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  {
    name: 'create_address_subnet',
    description: `Create a subnet address.

subnet accepts CIDR ("10.0.0.0/24"), "ip netmask", or a bare IP (/32).`,
    inputSchema: objectSchema(
      { name: nameProperty, subnet: { type: 'string', description: 'Subnet' }, comment: commentProperty },
      ['adom', 'name', 'subnet']
    ),
  },
  {
    name: 'create_address_host',
    description: `Create a single-host address (/32).`,
    inputSchema: objectSchema(
      { name: nameProperty, ip: { type: 'string', description: 'Host IPv4 address' }, comment: commentProperty },
      ['adom', 'name', 'ip']
    ),
  },
  {
    name: 'create_address_fqdn',
    description: `Create an FQDN address, resolved by the FortiGate at runtime.`,
    inputSchema: objectSchema(
      { name: nameProperty, fqdn: { type: 'string', description: 'Domain name' }, comment: commentProperty },
      ['adom', 'name', 'fqdn']
    ),
  },
  {
    name: 'create_address_range',
    description: `Create an IP range address.`,
    inputSchema: objectSchema(
      {
        name: nameProperty,
        start_ip: { type: 'string', description: 'First address' },
        end_ip: { type: 'string', description: 'Last address' },
        comment: commentProperty,
      },
      ['adom', 'name', 'start_ip', 'end_ip']
    ),
  },
  {
    name: 'update_address',
    description: `Update an address: rename, change subnet or FQDN, or set the comment.`,
    inputSchema: objectSchema(
      {
        name: nameProperty,
        new_name: { type: 'string', description: 'New name' },
        subnet: { type: 'string', description: 'New subnet (CIDR or "ip netmask")' },
        fqdn: { type: 'string', description: 'New FQDN' },
        comment: commentProperty,
      },
      ['adom', 'name']
    ),
  },
  {
    name: 'delete_address',
    description: `Delete an address object.

Fails when the address is still referenced by a policy or group.

Related tools:
- search_firewall_policies: Find referencing policies`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  // Address groups
  {
    name: 'list_address_groups',
    description: `List address groups.`,
    inputSchema: objectSchema({ name_filter: nameFilterProperty }, []),
  },
  {
    name: 'get_address_group',
    description: `Get one address group with its members.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  {
    name: 'create_address_group',
    description: `Create an address group from existing address objects.`,
    inputSchema: objectSchema(
      { name: nameProperty, members: membersProperty, comment: commentProperty },
      ['adom', 'name', 'members']
    ),
  },
  {
    name: 'update_address_group',
    description: `Replace an address group's member list or comment.`,
    inputSchema: objectSchema({ name: nameProperty, members: membersProperty, comment: commentProperty }, [
      'adom',
      'name',
    ]),
  },
  {
    name: 'delete_address_group',
    description: `Delete an address group.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  // Services
  {
    name: 'list_services',
    description: `List custom service objects.`,
    inputSchema: objectSchema(
      { name_filter: nameFilterProperty, protocol_filter: { type: 'string', description: 'Protocol equals' } },
      []
    ),
  },
  {
    name: 'get_service',
    description: `Get one custom service.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  {
    name: 'create_service_tcp_udp',
    description: `Create a TCP/UDP/SCTP service.

Port ranges look like "80", "8080-8090" or "80 443". At least one range
is required.`,
    inputSchema: objectSchema(
      {
        name: nameProperty,
        tcp_portrange: { type: 'string', description: 'TCP ports' },
        udp_portrange: { type: 'string', description: 'UDP ports' },
        sctp_portrange: { type: 'string', description: 'SCTP ports' },
        udplite_portrange: { type: 'string', description: 'UDP-Lite ports' },
        comment: commentProperty,
      },
      ['adom', 'name']
    ),
  },
  {
    name: 'create_service_icmp',
    description: `Create an ICMP service, optionally limited to one type and code.`,
    inputSchema: objectSchema(
      {
        name: nameProperty,
        icmp_type: { type: 'number', description: 'ICMP type, e.g. 8 for echo request' },
        icmp_code: { type: 'number', description: 'ICMP code' },
        comment: commentProperty,
      },
      ['adom', 'name']
    ),
  },
  {
    name: 'update_service',
    description: `Update a custom service's port ranges or comment.`,
    inputSchema: objectSchema(
      {
        name: nameProperty,
        tcp_portrange: { type: 'string', description: 'TCP ports' },
        udp_portrange: { type: 'string', description: 'UDP ports' },
        comment: commentProperty,
      },
      ['adom', 'name']
    ),
  },
  {
    name: 'delete_service',
    description: `Delete a custom service.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  // Service groups
  {
    name: 'list_service_groups',
    description: `List service groups.`,
    inputSchema: objectSchema({ name_filter: nameFilterProperty }, []),
  },
  {
    name: 'get_service_group',
    description: `Get one service group with its members.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  {
    name: 'create_service_group',
    description: `Create a service group from existing services.`,
    inputSchema: objectSchema(
      { name: nameProperty, members: membersProperty, comment: commentProperty },
      ['adom', 'name', 'members']
    ),
  },
  {
    name: 'delete_service_group',
    description: `Delete a service group.`,
    inputSchema: objectSchema({ name: nameProperty }, ['adom', 'name']),
  },
  {
    name: 'search_objects',
    description: `Search addresses, address groups, services and service groups by name.

Use for:
- Checking whether an object already exists before creating it
- Finding objects that follow a naming convention

Returns the four result lists and a total count.`,
    inputSchema: objectSchema({ search_term: { type: 'string', description: 'Name contains' } }, [
      'adom',
      'search_term',
    ]),
  },
];

/** Rewrite duplicate and in-use failures so the message names the object */
async function objectOperation<T>(kind: string, objectName: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isDuplicateError(error)) {
      throw new ObjectError(`${kind} '${objectName}' already exists`, -6);
    }
    if (isObjectInUseError(error)) {
      throw new ObjectError(`${kind} '${objectName}' is still in use and cannot be deleted`, -7);
    }
    throw error;
  }
}

function nameFilters(args: ToolArgs, exact?: [field: string, key: string]): FmgFilter[] | undefined {
  const filters: FmgFilter[] = [];
  const name = optionalString(args, 'name_filter');
  if (name) filters.push(['name', 'contain', name]);
  if (exact) {
    const value = optionalString(args, exact[1]);
    if (value) filters.push([exact[0], '==', exact[0] === 'type' ? validateAddressType(value) : value]);
  }
  return filters.length > 0 ? filters : undefined;
}

function withComment(record: FmgRecord, args: ToolArgs): FmgRecord {
  const comment = optionalString(args, 'comment');
  if (comment) record.comment = comment;
  return record;
}

export async function handleObjectTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;
  const adom = adomArg(args, ctx);

  switch (name) {
    // ---------------------------------------------------------------- addresses
    case 'list_addresses': {
      const addresses = await client.listAddresses(adom, { filter: nameFilters(args, ['type', 'type_filter']) });
      return toJson({ status: 'success', count: addresses.length, addresses });
    }

    case 'get_address': {
      const address = await client.getAddress(adom, validateObjectName(requireString(args, 'name'), 'address'));
      return toJson({ status: 'success', address });
    }

    case 'create_address_subnet': {
      const objName = validateObjectName(requireString(args, 'name'), 'address');
      const address = withComment(
        { name: objName, type: 'ipmask', subnet: parseSubnet(requireString(args, 'subnet')) },
        args
      );
      await objectOperation('Address', objName, () => client.createAddress(adom, address));
      return toJson({ status: 'success', name: objName, message: `Address ${objName} created successfully` });
    }

    case 'create_address_host': {
      const objName = validateObjectName(requireString(args, 'name'), 'address');
      const ip = validateIpv4Address(requireString(args, 'ip'));
      const address = withComment({ name: objName, type: 'ipmask', subnet: [ip, '255.255.255.255'] }, args);
      await objectOperation('Address', objName, () => client.createAddress(adom, address));
      return toJson({ status: 'success', name: objName, message: `Host address ${objName} created successfully` });
    }

    case 'create_address_fqdn': {
      const objName = validateObjectName(requireString(args, 'name'), 'address');
      const address = withComment({ name: objName, type: 'fqdn', fqdn: validateFqdn(requireString(args, 'fqdn')) }, args);
      await objectOperation('Address', objName, () => client.createAddress(adom, address));
      return toJson({ status: 'success', name: objName, message: `FQDN address ${objName} created successfully` });
    }

    case 'create_address_range': {
      const objName = validateObjectName(requireString(args, 'name'), 'address');
      const address = withComment(
        {
          name: objName,
          type: 'iprange',
          'start-ip': validateIpv4Address(requireString(args, 'start_ip')),
          'end-ip': validateIpv4Address(requireString(args, 'end_ip')),
        },
        args
      );
      await objectOperation('Address', objName, () => client.createAddress(adom, address));
      return toJson({ status: 'success', name: objName, message: `IP range address ${objName} created successfully` });
    }

    case 'update_address': {
      const objName = validateObjectName(requireString(args, 'name'), 'address');
      const data: FmgRecord = {};
      const newName = optionalString(args, 'new_name');
      const subnet = optionalString(args, 'subnet');
      const fqdn = optionalString(args, 'fqdn');
      const comment = optionalString(args, 'comment');
      if (newName) data.name = validateObjectName(newName, 'address');
      if (subnet) data.subnet = parseSubnet(subnet);
      if (fqdn) data.fqdn = validateFqdn(fqdn);
      if (comment !== undefined) data.comment = comment;
      if (Object.keys(data).length === 0) {
        throw new ValidationError('No update parameters provided');
      }
      await client.updateAddress(adom, objName, data);
      return toJson({ status: 'success', message: `Address ${objName} updated successfully` });
    }

    case 'delete_address': {
      const objName = validateObjectName(requireString(args, 'name'), 'address');
      await objectOperation('Address', objName, () => client.deleteAddress(adom, objName));
      return toJson({ status: 'success', message: `Address ${objName} deleted successfully` });
    }

    // ----------------------------------------------------------- address groups
    case 'list_address_groups': {
      const groups = await client.listAddressGroups(adom, { filter: nameFilters(args) });
      return toJson({ status: 'success', count: groups.length, groups });
    }

    case 'get_address_group': {
      const group = await client.getAddressGroup(adom, validateObjectName(requireString(args, 'name'), 'address group'));
      return toJson({ status: 'success', group });
    }

    case 'create_address_group': {
      const objName = validateObjectName(requireString(args, 'name'), 'address group');
      const group = withComment({ name: objName, member: requireStringArray(args, 'members') }, args);
      await objectOperation('Address group', objName, () => client.createAddressGroup(adom, group));
      return toJson({ status: 'success', name: objName, message: `Address group ${objName} created successfully` });
    }

    case 'update_address_group': {
      const objName = validateObjectName(requireString(args, 'name'), 'address group');
      const data: FmgRecord = {};
      const members = optionalStringArray(args, 'members');
      const comment = optionalString(args, 'comment');
      if (members !== undefined) data.member = members;
      if (comment !== undefined) data.comment = comment;
      if (Object.keys(data).length === 0) {
        throw new ValidationError('No update parameters provided');
      }
      await client.updateAddressGroup(adom, objName, data);
      return toJson({ status: 'success', message: `Address group ${objName} updated successfully` });
    }

    case 'delete_address_group': {
      const objName = validateObjectName(requireString(args, 'name'), 'address group');
      await objectOperation('Address group', objName, () => client.deleteAddressGroup(adom, objName));
      return toJson({ status: 'success', message: `Address group ${objName} deleted successfully` });
    }

    // ----------------------------------------------------------------- services
    case 'list_services': {
      const services = await client.listServices(adom, { filter: nameFilters(args, ['protocol', 'protocol_filter']) });
      return toJson({ status: 'success', count: services.length, services });
    }

    case 'get_service': {
      const service = await client.getService(adom, validateObjectName(requireString(args, 'name'), 'service'));
      return toJson({ status: 'success', service });
    }

    case 'create_service_tcp_udp': {
      const objName = validateObjectName(requireString(args, 'name'), 'service');
      const ranges: Array<[string, string]> = [
        ['tcp_portrange', 'tcp-portrange'],
        ['udp_portrange', 'udp-portrange'],
        ['sctp_portrange', 'sctp-portrange'],
        ['udplite_portrange', 'udplite-portrange'],
      ];
      const service: FmgRecord = { name: objName, protocol: 15 };
      let rangeCount = 0;
      for (const [key, field] of ranges) {
        const value = optionalString(args, key);
        if (value) {
          service[field] = validatePortRange(value);
          rangeCount++;
        }
      }
      if (rangeCount === 0) {
        throw new ValidationError('At least one port range required');
      }
      withComment(service, args);
      await objectOperation('Service', objName, () => client.createService(adom, service));
      return toJson({ status: 'success', name: objName, message: `Service ${objName} created successfully` });
    }

    case 'create_service_icmp': {
      const objName = validateObjectName(requireString(args, 'name'), 'service');
      const service: FmgRecord = { name: objName, protocol: 'ICMP' };
      const icmpType = optionalInteger(args, 'icmp_type');
      const icmpCode = optionalInteger(args, 'icmp_code');
      if (icmpType !== undefined) service.icmptype = icmpType;
      if (icmpCode !== undefined) service.icmpcode = icmpCode;
      withComment(service, args);
      await objectOperation('Service', objName, () => client.createService(adom, service));
      return toJson({ status: 'success', name: objName, message: `ICMP service ${objName} created successfully` });
    }

    case 'update_service': {
      const objName = validateObjectName(requireString(args, 'name'), 'service');
      const data: FmgRecord = {};
      const tcp = optionalString(args, 'tcp_portrange');
      const udp = optionalString(args, 'udp_portrange');
      const comment = optionalString(args, 'comment');
      if (tcp !== undefined) data['tcp-portrange'] = validatePortRange(tcp);
      if (udp !== undefined) data['udp-portrange'] = validatePortRange(udp);
      if (comment !== undefined) data.comment = comment;
      if (Object.keys(data).length === 0) {
        throw new ValidationError('No update parameters provided');
      }
      await client.updateService(adom, objName, data);
      return toJson({ status: 'success', message: `Service ${objName} updated successfully` });
    }

    case 'delete_service': {
      const objName = validateObjectName(requireString(args, 'name'), 'service');
      await objectOperation('Service', objName, () => client.deleteService(adom, objName));
      return toJson({ status: 'success', message: `Service ${objName} deleted successfully` });
    }

    // ----------------------------------------------------------- service groups
    case 'list_service_groups': {
      const groups = await client.listServiceGroups(adom, { filter: nameFilters(args) });
      return toJson({ status: 'success', count: groups.length, groups });
    }

    case 'get_service_group': {
      const group = await client.getServiceGroup(adom, validateObjectName(requireString(args, 'name'), 'service group'));
      return toJson({ status: 'success', group });
    }

    case 'create_service_group': {
      const objName = validateObjectName(requireString(args, 'name'), 'service group');
      const group = withComment({ name: objName, member: requireStringArray(args, 'members') }, args);
      await objectOperation('Service group', objName, () => client.createServiceGroup(adom, group));
      return toJson({ status: 'success', name: objName, message: `Service group ${objName} created successfully` });
    }

    case 'delete_service_group': {
      const objName = validateObjectName(requireString(args, 'name'), 'service group');
      await objectOperation('Service group', objName, () => client.deleteServiceGroup(adom, objName));
      return toJson({ status: 'success', message: `Service group ${objName} deleted successfully` });
    }

    case 'search_objects': {
      const filter: FmgFilter[] = [['name', 'contain', requireString(args, 'search_term')]];
      const addresses = await client.listAddresses(adom, { filter });
      const addressGroups = await client.listAddressGroups(adom, { filter });
      const services = await client.listServices(adom, { filter });
      const serviceGroups = await client.listServiceGroups(adom, { filter });
      return toJson({
        status: 'success',
        addresses,
        address_groups: addressGroups,
        services,
        service_groups: serviceGroups,
        total_count: addresses.length + addressGroups.length + services.length + serviceGroups.length,
      });
    }

    default:
      throw new Error(`Unknown object tool: ${name}`);
  }
}
