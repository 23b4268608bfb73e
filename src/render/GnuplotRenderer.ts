/**
 * GnuplotRenderer - gnuplot 프로세스로 스크립트 실행
 *
 * 스크립트를 stdin 으로 넘기고 `-p` 로 창을 유지합니다.
 * terminal 출력(dumb 등)은 부모 stdout 으로 그대로 나갑니다.
 */

import { spawn } from 'node:child_process';
import { ExternalCollaboratorError } from '../core/errors';
import { createLogger } from '../core/logger';

const log = createLogger('GnuplotRenderer');

/**
 * 플롯 스크립트를 받아 그리는 협력자
 */
export interface Renderer {
  render(script: string): Promise<void>;
}

export class GnuplotRenderer implements Renderer {
  readonly binary: string;

  constructor(binary = 'gnuplot') {
    this.binary = binary;
  }

  render(script: string): Promise<void> {
    log.debug(`spawning ${this.binary}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, ['-p'], { stdio: ['pipe', 'inherit', 'pipe'] });
      const stderr: Buffer[] = [];

      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', error => {
        reject(new ExternalCollaboratorError('renderer', `cannot start ${this.binary}`, error));
      });

      child.on('close', code => {
        if (code === 0) {
          resolve();
          return;
        }
        const detail = Buffer.concat(stderr).toString('utf8').trim();
        reject(
          new ExternalCollaboratorError(
            'renderer',
            `${this.binary} exited with code ${code ?? 'null'}${detail ? `: ${detail}` : ''}`
          )
        );
      });

      child.stdin.on('error', error => {
        log.warn('gnuplot closed its input early', error);
      });
      child.stdin.end(script);
    });
  }
}
