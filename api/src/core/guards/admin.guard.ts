import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { AppConfigService } from '../config/app-config.service';
import { safeEqual } from '../../shared/security/secret-compare.util';

type RequestLike = {
  headers?: Record<string, string | string[] | undefined>;
};

function getHeader(req: RequestLike, name: string): string {
  const value = req.headers?.[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value[0] ?? '';
  return '';
}

/** Operator endpoints: `x-admin-key` must match `ADMIN_KEY`. */
@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private readonly config: AppConfigService) {}

  canActivate(ctx: ExecutionContext): boolean {
    const req = ctx.switchToHttp().getRequest<RequestLike>();
    const want = this.config.getAdminKey() ?? '';
    if (!want) throw new UnauthorizedException('Admin key not configured');
    if (this.config.isProduction() && want.length < 16) {
      throw new UnauthorizedException(
        'Admin key not properly configured for production',
      );
    }
    const key = getHeader(req, 'x-admin-key');
    if (key && safeEqual(key, want)) return true;
    throw new UnauthorizedException('Missing or invalid admin key');
  }
}
