import { describe, expect, it } from "vitest";
import { generateServerBlock } from "./nginx-server-block.js";

describe("generateServerBlock", () => {
  it("proxies every path to the backend on the default_server slot", () => {
    const block = generateServerBlock({ backend: { ip: "10.0.0.120", port: 8000 }, listenPort: 80 });

    expect(block).toBe(`server {
    listen 80 default_server;
    listen [::]:80 default_server;

    root /var/www/html;
    index index.html index.htm index.nginx-debian.html;

    server_name _;

    location / {
        proxy_pass http://10.0.0.120:8000;
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }
}
`);
  });

  it("uses the configured listen port for both address families", () => {
    const lines = generateServerBlock({ backend: { ip: "10.0.0.121", port: 3000 }, listenPort: 8080 }).split("\n");

    expect(lines[1]).toBe("    listen 8080 default_server;");
    expect(lines[2]).toBe("    listen [::]:8080 default_server;");
    expect(lines).toContain("        proxy_pass http://10.0.0.121:3000;");
  });

  it("is deterministic", () => {
    const workload = { backend: { ip: "10.0.0.120", port: 8000 }, listenPort: 80 };
    expect(generateServerBlock(workload)).toBe(generateServerBlock(workload));
  });
});
