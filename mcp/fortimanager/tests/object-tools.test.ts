import { describe, it, expect, vi } from 'vitest';
import { handleObjectTool } from '../src/tools/objects.js';
import { ObjectError, ResourceNotFoundError, parseFmgError } from '../src/lib/errors.js';
import { parse, testContext } from './helpers.js';

describe('address tools', () => {
  it('should convert CIDR subnets to address/netmask pairs', async () => {
    const ctx = testContext();
    const create = vi.spyOn(ctx.client, 'createAddress').mockResolvedValue({ name: 'lan' });

    const result = parse(
      await handleObjectTool('create_address_subnet', { name: 'lan', subnet: '10.10.0.0/16', comment: 'HQ LAN' }, ctx)
    );

    expect(create).toHaveBeenCalledWith('root', {
      name: 'lan',
      type: 'ipmask',
      subnet: ['10.10.0.0', '255.255.0.0'],
      comment: 'HQ LAN',
    });
    expect(result).toEqual({ status: 'success', name: 'lan', message: 'Address lan created successfully' });
  });

  it('should create host addresses with a /32 mask', async () => {
    const ctx = testContext();
    const create = vi.spyOn(ctx.client, 'createAddress').mockResolvedValue({});

    await handleObjectTool('create_address_host', { name: 'dns1', ip: '10.0.0.53' }, ctx);

    expect(create).toHaveBeenCalledWith('root', { name: 'dns1', type: 'ipmask', subnet: ['10.0.0.53', '255.255.255.255'] });
  });

  it('should report duplicates by object name', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'createAddress').mockRejectedValue(parseFmgError(-6, '', '/pm/config/adom/root/obj/firewall/address'));

    const error = await handleObjectTool('create_address_fqdn', { name: 'portal', fqdn: 'portal.example.com' }, ctx).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ObjectError);
    expect(error).toHaveProperty('message', "Address 'portal' already exists");
    expect(error).toHaveProperty('code', -6);
  });

  it('should explain why an address cannot be deleted', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'deleteAddress').mockRejectedValue(parseFmgError(-7, 'used by policy 4'));

    await expect(handleObjectTool('delete_address', { name: 'lan' }, ctx)).rejects.toThrow(
      "Address 'lan' is still in use and cannot be deleted"
    );
  });

  it('should pass other failures through unchanged', async () => {
    const ctx = testContext();
    const notFound = new ResourceNotFoundError('Requested resource not found', -4);
    vi.spyOn(ctx.client, 'deleteAddress').mockRejectedValue(notFound);

    await expect(handleObjectTool('delete_address', { name: 'lan' }, ctx)).rejects.toBe(notFound);
  });

  it('should filter address lists by name and type', async () => {
    const ctx = testContext();
    const list = vi.spyOn(ctx.client, 'listAddresses').mockResolvedValue([{ name: 'portal', type: 'fqdn' }]);

    const result = parse(await handleObjectTool('list_addresses', { name_filter: 'port', type_filter: 'FQDN' }, ctx));

    expect(list).toHaveBeenCalledWith('root', {
      filter: [
        ['name', 'contain', 'port'],
        ['type', '==', 'fqdn'],
      ],
    });
    expect(result).toEqual({ status: 'success', count: 1, addresses: [{ name: 'portal', type: 'fqdn' }] });
  });

  it('should reject an update with nothing to change', async () => {
    await expect(handleObjectTool('update_address', { name: 'lan' }, testContext())).rejects.toThrow(
      'No update parameters provided'
    );
  });
});

describe('service tools', () => {
  it('should create TCP/UDP services with protocol 15', async () => {
    const ctx = testContext();
    const create = vi.spyOn(ctx.client, 'createService').mockResolvedValue({});

    const result = parse(
      await handleObjectTool('create_service_tcp_udp', { name: 'web-alt', tcp_portrange: '8080 8443' }, ctx)
    );

    expect(create).toHaveBeenCalledWith('root', { name: 'web-alt', protocol: 15, 'tcp-portrange': '8080 8443' });
    expect(result).toEqual({ status: 'success', name: 'web-alt', message: 'Service web-alt created successfully' });
  });

  it('should require a port range', async () => {
    await expect(handleObjectTool('create_service_tcp_udp', { name: 'empty' }, testContext())).rejects.toThrow(
      'At least one port range required'
    );
  });

  it('should create ICMP services', async () => {
    const ctx = testContext();
    const create = vi.spyOn(ctx.client, 'createService').mockResolvedValue({});

    await handleObjectTool('create_service_icmp', { name: 'ping', icmp_type: 8, icmp_code: 0 }, ctx);

    expect(create).toHaveBeenCalledWith('root', { name: 'ping', protocol: 'ICMP', icmptype: 8, icmpcode: 0 });
  });

  it('should create service groups from member names', async () => {
    const ctx = testContext();
    const create = vi.spyOn(ctx.client, 'createServiceGroup').mockResolvedValue({});

    const result = parse(await handleObjectTool('create_service_group', { name: 'web', members: ['HTTP', 'HTTPS'] }, ctx));

    expect(create).toHaveBeenCalledWith('root', { name: 'web', member: ['HTTP', 'HTTPS'] });
    expect(result).toEqual({ status: 'success', name: 'web', message: 'Service group web created successfully' });
  });
});

describe('search_objects', () => {
  it('should search all four object tables', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'listAddresses').mockResolvedValue([{ name: 'web1' }, { name: 'web2' }]);
    vi.spyOn(ctx.client, 'listAddressGroups').mockResolvedValue([{ name: 'web-servers' }]);
    const services = vi.spyOn(ctx.client, 'listServices').mockResolvedValue([]);
    vi.spyOn(ctx.client, 'listServiceGroups').mockResolvedValue([{ name: 'web' }]);

    const result = parse(await handleObjectTool('search_objects', { search_term: 'web' }, ctx));

    expect(services).toHaveBeenCalledWith('root', { filter: [['name', 'contain', 'web']] });
    expect(result).toEqual({
      status: 'success',
      addresses: [{ name: 'web1' }, { name: 'web2' }],
      address_groups: [{ name: 'web-servers' }],
      services: [],
      service_groups: [{ name: 'web' }],
      total_count: 4,
    });
  });
});
