import type { NginxProxyWorkload } from "../provisioning/target-config-schema.js";

export const NGINX_SITE_NAME = "provisioned";
export const NGINX_SITE_PATH = `/etc/nginx/sites-available/${NGINX_SITE_NAME}`;
export const NGINX_ENABLED_PATH = `/etc/nginx/sites-enabled/${NGINX_SITE_NAME}`;
export const NGINX_DEFAULT_ENABLED_PATH = "/etc/nginx/sites-enabled/default";

/**
 * Generate the reverse-proxy server block. Takes the default_server slot on
 * the listen port so the distribution's default site cannot shadow it.
 */
export function generateServerBlock(workload: Pick<NginxProxyWorkload, "backend" | "listenPort">): string {
  const { backend, listenPort } = workload;
  return `server {
    listen ${listenPort} default_server;
    listen [::]:${listenPort} default_server;

    root /var/www/html;
    index index.html index.htm index.nginx-debian.html;

    server_name _;

    location / {
        proxy_pass http://${backend.ip}:${backend.port};
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }
}
`;
}
