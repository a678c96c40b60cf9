import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { DispatchErrorCode } from '@fletes/shared';
import { ActingUserGuard } from '../../../../src/auth/guards/acting-user.guard';
import { DispatchRequest } from '../../../../src/auth/dispatch-request';
import { authorizationError } from '../../../../src/common/dispatch-errors';
import { ConfigService } from '../../../../src/config/config.service';
import { UsersService } from '../../../../src/users/users.service';
import { USERS, rejectionOf } from '../../../support/dispatch-fixtures';

describe('ActingUserGuard', () => {
  let guard: ActingUserGuard;

  const mockUsersService = {
    getActingUser: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ActingUserGuard, ConfigService, { provide: UsersService, useValue: mockUsersService }],
    }).compile();

    guard = module.get<ActingUserGuard>(ActingUserGuard);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  const requestWith = (headers: DispatchRequest['headers']): Partial<DispatchRequest> => ({ headers });

  it('should attach the acting user and a deadline to the request', async () => {
    mockUsersService.getActingUser.mockResolvedValue(USERS.coordinator);
    const request = requestWith({ 'x-usuario': 'coord1' });

    const allowed = await guard.canActivate(new ExecutionContextHost([request]));

    expect(allowed).toBe(true);
    expect(mockUsersService.getActingUser).toHaveBeenCalledWith('coord1', expect.any(AbortSignal));
    expect(request.operationContext?.actor).toBe(USERS.coordinator);
    expect(request.operationContext?.signal?.aborted).toBe(false);
  });

  it('should take the first value of a repeated header', async () => {
    mockUsersService.getActingUser.mockResolvedValue(USERS.admin);

    await guard.canActivate(new ExecutionContextHost([requestWith({ 'x-usuario': ['admin1', 'otro'] })]));

    expect(mockUsersService.getActingUser).toHaveBeenCalledWith('admin1', expect.any(AbortSignal));
  });

  it('should propagate directory rejections', async () => {
    mockUsersService.getActingUser.mockRejectedValue(
      authorizationError({ code: DispatchErrorCode.UserNotFound, message: 'El usuario X no existe o está inactivo' }),
    );

    const error = await rejectionOf(guard.canActivate(new ExecutionContextHost([requestWith({})])));

    expect(error.code).toBe(DispatchErrorCode.UserNotFound);
    expect(mockUsersService.getActingUser).toHaveBeenCalledWith(undefined, expect.any(AbortSignal));
  });
});
