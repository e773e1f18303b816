import { describe, expect, it } from "vitest";

import { parseComposition, parseHostPort } from "./compose.js";

const COMPOSE_PATH = "/catalog/nginx/CVE-0000-0001/docker-compose.yml";

describe("parseComposition", () => {
  it("collects service names, first host ports and deduplicated images", () => {
    const text = [
      'version: "2"',
      "services:",
      "  web:",
      "    image: example/nginx:1.19",
      "    ports:",
      '      - "8080:80"',
      '      - "8443:443"',
      "  db:",
      "    image: example/mysql:5.7",
      "  proxy:",
      "    image: example/nginx:1.19",
      "    ports:",
      "      - target: 80",
      "        published: 9090",
      "x-extra:",
      "  anything: 1",
      "",
    ].join("\n");

    const parsed = parseComposition(text, COMPOSE_PATH);

    expect(parsed).toEqual({
      ok: true,
      composition: {
        serviceNames: ["web", "db", "proxy"],
        services: { web: 8080, proxy: 9090 },
        images: ["example/nginx:1.19", "example/mysql:5.7"],
      },
    });
  });

  it("treats an empty file as a composition without services", () => {
    expect(parseComposition("", COMPOSE_PATH)).toEqual({
      ok: true,
      composition: { serviceNames: [], services: {}, images: [] },
    });
  });

  it("recovers image references from a file the YAML parser rejects", () => {
    const text = ["services:", "  web:", "    image: example/app:1", "    ports: [", ""].join("\n");

    const parsed = parseComposition(text, COMPOSE_PATH);

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.images).toEqual(["example/app:1"]);
    expect(parsed.error.composePath).toBe(COMPOSE_PATH);
    expect(parsed.error.message.startsWith(`Invalid YAML in ${COMPOSE_PATH}`)).toBe(true);
  });

  it("rejects a services list", () => {
    const parsed = parseComposition("services:\n  - web\n", COMPOSE_PATH);

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.message).toBe(`"services" must be a mapping in ${COMPOSE_PATH}`);
  });

  it("rejects a scalar document", () => {
    const parsed = parseComposition("just text\n", COMPOSE_PATH);

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.images).toEqual([]);
  });
});

describe("parseHostPort", () => {
  it.each([
    ["8080:80", 8080],
    ["8080:80/udp", 8080],
    ["127.0.0.1:8080:80/tcp", 8080],
    ["80", null],
    ["8000-8010:8000-8010", null],
    ["70000:80", null],
  ])("parses %s", (entry, expected) => {
    expect(parseHostPort(entry)).toBe(expected);
  });

  it("reads the long syntax and ignores bare numbers", () => {
    expect(parseHostPort({ target: 80, published: 8081 })).toBe(8081);
    expect(parseHostPort({ target: 80, published: "8082" })).toBe(8082);
    expect(parseHostPort({ target: 80 })).toBeNull();
    expect(parseHostPort(80)).toBeNull();
  });
});
