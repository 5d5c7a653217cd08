import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { resolveDriverConfig, type DriverOptions } from '@/lib/config';
import { ConnectionClosedException, ConnectionException } from '@/lib/errors';
import { buildConnectConfig, buildHostVerifier, describeSshError, SshTransport } from '@/lib/transport/ssh';

const ssh = await vi.hoisted(async () => {
    const { EventEmitter } = await import('events');

    const state = {
        script: {} as Record<string, string | Buffer[]>,
        banner: '\r\nsw1>',
        connectError: undefined as Error | undefined,
    };

    class FakeChannel extends EventEmitter {
        writable = true;
        destroyed = false;
        written: string[] = [];

        write(data: string | Buffer) {
            const text = data.toString();
            this.written.push(text);
            const reply = state.script[text];
            if (typeof reply === 'string') {
                setImmediate(() => this.emit('data', Buffer.from(reply)));
            } else if (reply !== undefined) {
                this.emitSegments(reply);
            }
            return true;
        }

        emitSegments(segments: Buffer[]) {
            const [head, ...rest] = segments;
            if (!head) return;
            setImmediate(() => {
                this.emit('data', head);
                this.emitSegments(rest);
            });
        }

        end() {
            this.writable = false;
            return this;
        }
    }

    class FakeClient extends EventEmitter {
        config: unknown = null;
        channel = new FakeChannel();
        ended = false;

        connect(config: unknown) {
            this.config = config;
            instances.push(this);
            setImmediate(() => {
                if (state.connectError) this.emit('error', state.connectError);
                else this.emit('ready');
            });
            return this;
        }

        shell(_window: unknown, callback: (err: Error | undefined, channel: FakeChannel) => void) {
            setImmediate(() => {
                callback(undefined, this.channel);
                setImmediate(() => this.channel.emit('data', Buffer.from(state.banner)));
            });
            return this;
        }

        end() {
            this.ended = true;
            return this;
        }
    }

    const instances: FakeClient[] = [];
    return { state, instances, FakeClient };
});

vi.mock('ssh2', () => ({ Client: ssh.FakeClient }));

vi.mock('@/lib/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

const LOGIN_SCRIPT: Record<string, string> = {
    'enable\n': 'Password:',
    'test-secret\n': '\r\nsw1#',
    'terminal length 0\n': 'terminal length 0\r\nsw1#',
    'show sntp server\n': 'show sntp server\r\nHost Address: 10.0.0.5\r\nsw1#',
};

function connection(options: DriverOptions = {}) {
    return resolveDriverConfig('sw1', 'admin', 'test-password', 5, { secret: 'test-secret', ...options }).connection;
}

describe('SshTransport', () => {
    beforeEach(() => {
        ssh.instances.length = 0;
        ssh.state.script = { ...LOGIN_SCRIPT };
        ssh.state.connectError = undefined;
    });

    it('is not alive before open', () => {
        expect(new SshTransport(connection()).isAlive()).toEqual({ isAlive: false });
    });

    it('connects, enables and disables paging', async () => {
        const transport = new SshTransport(connection());
        await transport.open();

        const client = ssh.instances[0];
        expect(client.config).toMatchObject({
            host: 'sw1',
            port: 22,
            username: 'admin',
            password: 'test-password',
            tryKeyboard: true,
            readyTimeout: 5000,
            keepaliveInterval: 30000,
        });
        expect(client.channel.written).toEqual(['enable\n', 'test-secret\n', 'terminal length 0\n']);
        expect(transport.isAlive()).toEqual({ isAlive: true });
        expect(client.channel.written[client.channel.written.length - 1]).toBe('\0');
        await transport.close();
    });

    it('returns cleaned command output', async () => {
        const transport = new SshTransport(connection());
        await transport.open();

        await expect(transport.sendCommand('show sntp server')).resolves.toBe('Host Address: 10.0.0.5');
        await transport.close();
    });

    it('decodes a character split across packets', async () => {
        const reply = Buffer.from('show lldp remote-device all\r\nGi1/0/1  Stra\u00dfe-sw\r\nsw1#');
        const at = reply.indexOf(0xc3) + 1;
        ssh.state.script['show lldp remote-device all\n'] = [reply.subarray(0, at), reply.subarray(at)];
        const transport = new SshTransport(connection());
        await transport.open();

        await expect(transport.sendCommand('show lldp remote-device all')).resolves.toBe('Gi1/0/1  Stra\u00dfe-sw');
        await transport.close();
    });

    it('answers keyboard-interactive prompts with the password', async () => {
        const transport = new SshTransport(connection());
        await transport.open();

        const finish = vi.fn();
        ssh.instances[0].emit('keyboard-interactive', '', '', '', [{ prompt: 'Password: ', echo: false }], finish);
        expect(finish).toHaveBeenCalledWith(['test-password']);
        await transport.close();
    });

    it('reports authentication failures as ConnectionException', async () => {
        ssh.state.connectError = new Error('All configured authentication methods failed');
        const transport = new SshTransport(connection());

        const error = await transport.open().catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ConnectionException);
        expect(error).toHaveProperty('message', 'Authentication failed for sw1. Check the username, password or key.');
        expect(ssh.instances[0].ended).toBe(true);
    });

    it('raises ConnectionClosedException once the channel closes', async () => {
        const transport = new SshTransport(connection());
        await transport.open();

        ssh.instances[0].channel.emit('close');
        await expect(transport.sendCommand('show sntp server')).rejects.toThrow(ConnectionClosedException);
        expect(transport.isAlive()).toEqual({ isAlive: false });
        await transport.close();
    });

    it('ends the client on close', async () => {
        const transport = new SshTransport(connection());
        await transport.open();
        await transport.close();

        expect(ssh.instances[0].ended).toBe(true);
        expect(transport.isAlive()).toEqual({ isAlive: false });
    });
});

describe('buildConnectConfig', () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dnos6-ssh-'));
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('reads the key file and ssh_config aliases', async () => {
        const keyFile = path.join(tmpDir, 'id_test');
        const sshConfigFile = path.join(tmpDir, 'config');
        await fs.writeFile(keyFile, 'test-private-key');
        await fs.writeFile(sshConfigFile, 'Host sw1\n  HostName 10.1.1.1\n  Port 2200\n');

        const config = buildConnectConfig(connection({ useKeys: true, keyFile, sshConfigFile }));
        expect(config.host).toBe('10.1.1.1');
        expect(config.port).toBe(2200);
        expect(config.privateKey?.toString()).toBe('test-private-key');
    });

    it('fails with ConnectionException when the key file is missing', () => {
        const keyFile = path.join(tmpDir, 'missing');
        expect(() => buildConnectConfig(connection({ useKeys: true, keyFile }))).toThrow(ConnectionException);
    });

    it('verifies host keys against the alternate known hosts file', async () => {
        const altKeyFile = path.join(tmpDir, 'known_hosts');
        await fs.writeFile(altKeyFile, `sw1 ssh-rsa ${Buffer.from('key-one').toString('base64')}\n`);

        const verify = buildHostVerifier(connection({ sshStrict: true, altHostKeys: true, altKeyFile }), 'sw1', 22);
        expect(verify).toBeDefined();
        expect(verify?.(Buffer.from('key-one'))).toBe(true);
        expect(verify?.(Buffer.from('key-two'))).toBe(false);
    });

    it('skips host key checks unless strict', () => {
        expect(buildHostVerifier(connection(), 'sw1', 22)).toBeUndefined();
        expect(buildConnectConfig(connection()).hostVerifier).toBeUndefined();
    });
});

describe('describeSshError', () => {
    it('maps common socket errors', () => {
        expect(describeSshError('sw1', new Error('connect ECONNREFUSED 10.0.0.1:22'))).toBe(
            'Connection refused by sw1. Check that SSH is enabled on the switch.',
        );
        expect(describeSshError('sw1', new Error('getaddrinfo ENOTFOUND sw1'))).toBe('Cannot resolve hostname sw1');
        expect(describeSshError('sw1', new Error('boom'))).toBe('SSH connection failed for sw1: boom');
    });
});
