import { PushFileDto, SshTargetDto } from '../modules/transfer/dto/push-file.dto';
import { InvalidOptionsError, toValidatedDto } from './validation';

describe('toValidatedDto', () => {
  it('converts numeric strings and applies defaults', async () => {
    const dto = await toValidatedDto(PushFileDto, {
      sourcePath: 'build/app.tar.gz',
      destinationPath: 'releases/app.tar.gz',
      target: { host: '10.0.1.4', username: 'deploy', password: undefined },
      blockSize: '4096',
    });

    expect(dto).toBeInstanceOf(PushFileDto);
    expect(dto.target).toBeInstanceOf(SshTargetDto);
    expect(dto.target.port).toBe(22);
    expect(dto.target.password).toBeUndefined();
    expect(dto.blockSize).toBe(4096);
  });

  it('reads the port from a string', async () => {
    const dto = await toValidatedDto(SshTargetDto, {
      host: '10.0.1.4',
      port: '2222',
      username: 'deploy',
    });

    expect(dto.port).toBe(2222);
  });

  it('reports nested problems with their property path', async () => {
    const attempt = toValidatedDto(PushFileDto, {
      sourcePath: 'app.bin',
      destinationPath: 'app.bin',
      target: { username: 'deploy' },
      blockSize: '0',
    });

    await expect(attempt).rejects.toBeInstanceOf(InvalidOptionsError);
    const error = await attempt.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidOptionsError);
    if (error instanceof InvalidOptionsError) {
      expect(error.problems).toContain('target.host: host must be a string');
      expect(error.problems).toContain('blockSize: blockSize must not be less than 1');
    }
  });
});
