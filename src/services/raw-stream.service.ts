import net from 'net';
import type { PrintSettings } from '../models/print-job.model';
import { UnreachableError, toGatewayError } from '../utils/errors';
import { logger } from '../utils/logger';

export const RAW_PRINT_PORT = 9100;

const UEL = '\x1B%-12345X';

/** PJL-safe job name: printable ASCII without quotes */
function pjlName(value: string): string {
  return value.replace(/[^\x20-\x7E]/g, '').replace(/"/g, "'").slice(0, 80);
}

/**
 * PJL job wrapper for a print-ready payload. The settings travel in the
 * header so the device applies them without a driver.
 */
export function buildPjlHeader(jobName: string, settings: PrintSettings): Buffer {
  const lines = [
    `${UEL}@PJL JOB NAME="${pjlName(jobName)}"`,
    `@PJL SET QTY=${settings.copies}`,
    `@PJL SET PAPER=${settings.paperSize}`,
    `@PJL SET DUPLEX=${settings.duplex === 'simplex' ? 'OFF' : 'ON'}`,
  ];
  if (settings.duplex !== 'simplex') {
    lines.push(`@PJL SET BINDING=${settings.duplex === 'long-edge' ? 'LONGEDGE' : 'SHORTEDGE'}`);
  }
  lines.push(`@PJL SET RENDERMODE=${settings.colorMode === 'color' ? 'COLOR' : 'GRAYSCALE'}`);
  return Buffer.from(`${lines.join('\r\n')}\r\n`, 'latin1');
}

export function buildPjlTrailer(jobName: string): Buffer {
  return Buffer.from(`${UEL}@PJL EOJ NAME="${pjlName(jobName)}"\r\n${UEL}`, 'latin1');
}

export function wrapWithPjl(jobName: string, settings: PrintSettings, payload: Buffer): Buffer {
  return Buffer.concat([buildPjlHeader(jobName, settings), payload, buildPjlTrailer(jobName)]);
}

const CHUNK_BYTES = 64 * 1024;

/**
 * Send a buffer to a printer via TCP socket (RAW port 9100).
 * `idleTimeoutMs` bounds the connect and every stretch without write
 * progress, so a large payload on a slow link is not cut off halfway.
 */
export function sendRawToTcp(
  buffer: Buffer,
  host: string,
  port = RAW_PRINT_PORT,
  idleTimeoutMs = 10_000
): Promise<void> {
  return new Promise((resolve, reject) => {
    const client = new net.Socket();
    let settled = false;
    const fail = (error: unknown) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      client.destroy();
      reject(toGatewayError(error));
    };

    const timer = setTimeout(() => {
      fail(new UnreachableError(`TCP transfer to ${host}:${port} stalled for ${idleTimeoutMs}ms`));
    }, idleTimeoutMs);

    const writeFrom = (offset: number) => {
      if (settled) return;
      if (offset >= buffer.length) {
        client.end(() => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve();
        });
        return;
      }
      const chunk = buffer.subarray(offset, offset + CHUNK_BYTES);
      client.write(chunk, (err) => {
        if (err) {
          fail(err);
          return;
        }
        timer.refresh();
        writeFrom(offset + chunk.length);
      });
    };

    client.connect(port, host, () => {
      logger.info({ host, port, bytes: buffer.length }, 'Sending raw print data via TCP');
      timer.refresh();
      writeFrom(0);
    });

    client.on('error', fail);

    client.on('close', () => {
      fail(new UnreachableError(`TCP connection to ${host}:${port} closed before the transfer finished`));
    });
  });
}

/** Open and immediately close a TCP connection. Resolves when the port accepts. */
export function probeTcp(host: string, port = RAW_PRINT_PORT, timeoutMs = 5000): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new UnreachableError(`TCP probe to ${host}:${port} timed out`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.end();
      resolve();
    });
    socket.once('error', (error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(toGatewayError(error));
    });
  });
}
