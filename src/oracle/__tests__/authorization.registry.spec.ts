import { AuthorizationRegistry } from "../registry/authorization.registry";

describe("AuthorizationRegistry", () => {
  let registry: AuthorizationRegistry;

  beforeEach(() => {
    registry = new AuthorizationRegistry("admin-1", ["reporter-b", "reporter-a"]);
  });

  it("should require an administrator", () => {
    expect(() => new AuthorizationRegistry("")).toThrow("An administrator identity is required");
  });

  it("should authorize the bootstrap reporters", () => {
    expect(registry.isAuthorized("reporter-a")).toBe(true);
    expect(registry.listAuthorized()).toEqual(["reporter-a", "reporter-b"]);
  });

  it("should treat unknown and missing callers as unauthorized", () => {
    expect(registry.isAuthorized("stranger")).toBe(false);
    expect(registry.isAuthorized(undefined)).toBe(false);
    expect(registry.isAuthorized("")).toBe(false);
  });

  it("should grant and revoke authorization", () => {
    registry.setAuthorized("reporter-c", true);
    registry.setAuthorized("reporter-a", false);

    expect(registry.isAuthorized("reporter-c")).toBe(true);
    expect(registry.isAuthorized("reporter-a")).toBe(false);
    expect(registry.listAuthorized()).toEqual(["reporter-b", "reporter-c"]);
  });

  it("should not make the administrator a reporter", () => {
    expect(registry.isAdministrator("admin-1")).toBe(true);
    expect(registry.isAuthorized("admin-1")).toBe(false);
    expect(registry.isAdministrator(undefined)).toBe(false);
  });

  it("should transfer administration", () => {
    expect(registry.transferAdministration("admin-2")).toBe("admin-1");
    expect(registry.getAdministrator()).toBe("admin-2");
    expect(registry.isAdministrator("admin-1")).toBe(false);
  });

  it("should refuse an empty new administrator", () => {
    expect(() => registry.transferAdministration("")).toThrow("An administrator identity is required");
    expect(registry.getAdministrator()).toBe("admin-1");
  });
});
