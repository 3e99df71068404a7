// Application: Request-scoped auth handle
// The surface a page or route handler sees: one identity, one request channel

import type { LoginResult, RegistrationData, RegistrationResult, UserProfile } from '@/domain/user/types.js';
import type { RequestChannel, ResolutionOutcome } from '@/domain/identity/types.js';
import type { AuthService } from './AuthService.js';
import type { ProcessLocalIdentity } from './ProcessLocalIdentity.js';

export class RequestAuth {
  constructor(
    private service: AuthService,
    readonly identity: ProcessLocalIdentity,
    private channel: RequestChannel
  ) {}

  resolve(): ResolutionOutcome {
    return this.service.resolve(this.identity, this.channel);
  }

  isAuthenticated(): boolean {
    return this.service.isAuthenticated(this.identity);
  }

  currentUser(): UserProfile | null {
    return this.service.currentUser(this.identity);
  }

  hasAccess(requiredLevel: string): boolean {
    return this.service.hasAccess(this.identity, requiredLevel);
  }

  login(username: string, password: string): Promise<LoginResult> {
    return this.service.login(this.identity, this.channel, username, password);
  }

  logout(): boolean {
    return this.service.logout(this.identity, this.channel);
  }

  logoutEverywhere(): number {
    return this.service.logoutEverywhere(this.identity, this.channel);
  }

  register(data: RegistrationData): Promise<RegistrationResult> {
    return this.service.register(data);
  }

  embedInLink(url: string): string {
    return this.service.embedInLink(this.identity, url);
  }
}
