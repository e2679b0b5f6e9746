import { describe, expect, test } from "vitest";
import { ldap } from "../../src/ldap/index.js";
import { ConfigError, LdapClient } from "../../src/directory/index.js";

const client = {
  host: "ldap.example.com",
  base: "dc=example,dc=com",
  userFilter: "(uid=%s)",
  attributes: ["mail", "displayName"],
  bindDN: "cn=svc,dc=example,dc=com",
  bindPassword: "svcpw",
};

describe("Test config options calling the plugin", () => {

  test("Minimal config", () => {
    const plugin = ldap({ client });

    expect(plugin.id).toBe("ldap");
    expect(typeof plugin.endpoints.signInLdap).toBe("function");
  });

  test("All options", () => {
    ldap({
      client: new LdapClient(client),
      autoSignUp: true,
      linkAccountIfExisting: false,
      path: "/auth/ldap",
      providerId: "directory",
      emailAttribute: "mail",
      nameAttribute: "cn",
      onLdapAuthenticated({ username, attributes }) {
        return { email: attributes.mail, name: attributes.cn || username };
      },
    });
  });

  test("Invalid directory config fails when the plugin is created", () => {
    expect(() => ldap({ client: { ...client, userFilter: "(uid=alice)" } })).toThrow(ConfigError);
  });
});
