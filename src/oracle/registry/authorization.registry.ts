import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base";
import type { ReporterId } from "@/common/types/oracle";

/**
 * Which reporters may submit prices, and who administers the oracle.
 * A reporter absent from the map is not authorized.
 */
@Injectable()
export class AuthorizationRegistry extends BaseService {
  private readonly authorizations = new Map<ReporterId, boolean>();
  private administrator: ReporterId;

  constructor(administrator: ReporterId, bootstrapReporters: ReporterId[] = []) {
    super();
    if (!administrator) {
      throw new Error("An administrator identity is required");
    }
    this.administrator = administrator;
    for (const reporterId of bootstrapReporters) {
      this.authorizations.set(reporterId, true);
    }
    if (bootstrapReporters.length > 0) {
      this.logger.log(`Authorized ${bootstrapReporters.length} reporter(s) at startup`);
    }
  }

  isAuthorized(reporterId: ReporterId | undefined): boolean {
    if (!reporterId) {
      return false;
    }
    return this.authorizations.get(reporterId) ?? false;
  }

  setAuthorized(reporterId: ReporterId, authorized: boolean): void {
    this.authorizations.set(reporterId, authorized);
  }

  listAuthorized(): ReporterId[] {
    return [...this.authorizations]
      .filter(([, authorized]) => authorized)
      .map(([reporterId]) => reporterId)
      .sort();
  }

  getAdministrator(): ReporterId {
    return this.administrator;
  }

  isAdministrator(caller: ReporterId | undefined): boolean {
    return caller !== undefined && caller === this.administrator;
  }

  transferAdministration(newAdministrator: ReporterId): ReporterId {
    if (!newAdministrator) {
      throw new Error("An administrator identity is required");
    }
    const previous = this.administrator;
    this.administrator = newAdministrator;
    return previous;
  }
}
