import { Test, TestingModule } from '@nestjs/testing';
import { DispatchErrorCode, DispatchErrorKind, UserRole } from '@fletes/shared';
import { AwsService } from '../../../src/config/aws.service';
import { ConfigService } from '../../../src/config/config.service';
import { UsersService } from '../../../src/users/users.service';
import { createFakeAwsService, rejectionOf } from '../../support/dispatch-fixtures';

describe('UsersService', () => {
  let service: UsersService;
  let aws: ReturnType<typeof createFakeAwsService>;

  beforeEach(async () => {
    aws = createFakeAwsService();
    const module: TestingModule = await Test.createTestingModule({
      providers: [UsersService, ConfigService, { provide: AwsService, useValue: aws.service }],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  describe('getActingUser', () => {
    it('should resolve the user from the directory in upper case', async () => {
      const user = await service.getActingUser(' despacho1 ');

      expect(user).toEqual({
        username: 'DESPACHO1',
        role: UserRole.Dispatcher,
        region: 'CELTA',
        fullName: undefined,
        active: true,
      });
      expect(aws.send).toHaveBeenCalledWith(
        expect.objectContaining({
          input: { TableName: 'fletes-usuarios-dev', Key: { PK: 'USER#DESPACHO1', SK: 'METADATA' } },
        }),
        {},
      );
    });

    it('should require a username', async () => {
      const error = await rejectionOf(service.getActingUser(undefined));

      expect(error.kind).toBe(DispatchErrorKind.Authorization);
      expect(error.code).toBe(DispatchErrorCode.UserNotFound);
      expect(aws.send).not.toHaveBeenCalled();
    });

    it.each(['inactivo', 'desconocido'])('should reject %s users', async username => {
      const error = await rejectionOf(service.getActingUser(username));

      expect(error.code).toBe(DispatchErrorCode.UserNotFound);
      expect(error.message).toBe(`El usuario ${username.toUpperCase()} no existe o está inactivo`);
    });

    it('should report directory outages as external errors', async () => {
      aws.send.mockRejectedValueOnce(new Error('network'));

      const error = await rejectionOf(service.getActingUser('ADMIN1'));

      expect(error.kind).toBe(DispatchErrorKind.External);
      expect(error.code).toBe(DispatchErrorCode.DirectoryUnavailable);
    });
  });
});
