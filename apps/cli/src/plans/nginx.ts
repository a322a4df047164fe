import { readFile } from "node:fs/promises"
import { join } from "node:path"
import {
  type ActionGroup,
  commandAction,
  describeFailure,
  nginxValidator,
  packageAction,
  render,
  runCommand,
  type SubstitutionMap,
  symlinkAction,
  type Template,
  templateFileAction,
} from "@hostkit/engine"
import { getNginxEnabledPath, getNginxSitePath, TIMEOUTS, validateNotEmpty } from "@hostkit/shared"
import type { HostContext } from "../context.js"
import type { Prompter } from "../prompt.js"
import { pathExists } from "./steps.js"

export type TlsSetup =
  | { mode: "none" }
  /** Certificate files already on the host, e.g. a Cloudflare origin certificate */
  | { mode: "files"; certPath: string; keyPath: string }
  | { mode: "certbot"; email: string }

/**
 * Why a cert/key pair cannot be used, or null when both look like PEM.
 */
export async function checkPemPair(certPath: string, keyPath: string): Promise<string | null> {
  let cert: string
  let key: string
  try {
    ;[cert, key] = await Promise.all([readFile(certPath, "utf8"), readFile(keyPath, "utf8")])
  } catch (error) {
    return `Cannot read certificate files: ${describeFailure(error)}`
  }
  if (!/BEGIN CERTIFICATE/.test(cert) || !/BEGIN.*PRIVATE KEY/.test(key)) {
    return "Files do not appear to be in PEM format"
  }
  return null
}

export async function collectTls(prompter: Prompter, ctx: HostContext, domain: string): Promise<TlsSetup> {
  if (await prompter.confirm("tls.files", "Do you have existing SSL key and cert files (e.g. from Cloudflare)?", false)) {
    const keyPath = await prompter.ask("tls.key", "Path to private key (origin.key)", { validate: validateNotEmpty })
    const certPath = await prompter.ask("tls.cert", "Path to full certificate (origin.crt)", {
      validate: validateNotEmpty,
    })
    const problem = await checkPemPair(certPath, keyPath)
    if (problem === null) return { mode: "files", certPath, keyPath }
    ctx.logger.warn(`${problem}. Skipping manual SSL.`)
  }

  if (await prompter.confirm("tls.certbot", "Use Certbot to obtain a free certificate?", false)) {
    return { mode: "certbot", email: `admin@${domain}` }
  }
  return { mode: "none" }
}

export interface SiteOptions {
  /** File name under sites-available, usually the app folder */
  siteName: string
  domain: string
  /** Relative to the templates root, e.g. "nginx/next.conf" */
  templatePath: string
  /** Values beyond DOMAIN, FOLDER_NAME and TLS_BLOCK */
  substitutions: SubstitutionMap
  tls: TlsSetup
}

function siteGroup(ctx: HostContext, name: string, siteName: string, template: Template, substitutions: SubstitutionMap): ActionGroup {
  const { config, runner } = ctx
  const available = getNginxSitePath(config, siteName)

  return {
    name,
    actions: [
      templateFileAction({ path: available, template, substitutions }),
      symlinkAction({ path: getNginxEnabledPath(config, siteName), target: available }),
    ],
    validate: nginxValidator({ nginxDir: config.paths.nginxDir, runner }),
    activate: async () => {
      await runCommand(runner, "nginx", ["-t", "-q"], { timeoutMs: TIMEOUTS.VALIDATE })
      await ctx.systemd.reload("nginx")
    },
  }
}

function certbotGroup(ctx: HostContext, domain: string, email: string, fullchain: string): ActionGroup {
  const { runner } = ctx
  return {
    name: `TLS certificate for ${domain}`,
    atomic: false,
    actions: [
      packageAction({ package: "certbot", packages: ctx.packages }),
      packageAction({ package: "python3-certbot-nginx", packages: ctx.packages }),
      commandAction({
        name: `obtain certificate for ${domain}`,
        run: {
          command: "certbot",
          args: ["certonly", "--nginx", "-d", domain, "--non-interactive", "--agree-tos", "--email", email],
          options: { timeoutMs: TIMEOUTS.INSTALL },
        },
        creates: fullchain,
        runner,
      }),
    ],
  }
}

/**
 * Site file plus sites-enabled link, validated with `nginx -t` before
 * going live. Without a certificate yet, the site first goes live over
 * HTTP so certbot can answer its challenge, then again with TLS.
 */
export async function nginxSiteGroups(ctx: HostContext, site: SiteOptions): Promise<ActionGroup[]> {
  const { domain, siteName, tls } = site
  const template = await ctx.template(site.templatePath)
  const base: SubstitutionMap = { DOMAIN: domain, FOLDER_NAME: siteName, ...site.substitutions }

  const withTls = async (certPath: string, keyPath: string): Promise<SubstitutionMap> => ({
    ...base,
    TLS_BLOCK: render(await ctx.template("nginx/tls.conf"), { SSL_CERT_PATH: certPath, SSL_KEY_PATH: keyPath }),
  })

  switch (tls.mode) {
    case "none":
      return [siteGroup(ctx, `Nginx site ${domain}`, siteName, template, { ...base, TLS_BLOCK: "" })]
    case "files":
      return [siteGroup(ctx, `Nginx site ${domain}`, siteName, template, await withTls(tls.certPath, tls.keyPath))]
    case "certbot": {
      const live = join(ctx.config.paths.letsencryptLive, domain)
      const fullchain = join(live, "fullchain.pem")
      const https = siteGroup(
        ctx,
        `Nginx site ${domain} (HTTPS)`,
        siteName,
        template,
        await withTls(fullchain, join(live, "privkey.pem")),
      )
      if (await pathExists(fullchain)) return [https]
      return [
        siteGroup(ctx, `Nginx site ${domain} (HTTP)`, siteName, template, { ...base, TLS_BLOCK: "" }),
        certbotGroup(ctx, domain, tls.email, fullchain),
        https,
      ]
    }
  }
}

export function siteUrls(domain: string, tls: TlsSetup): string[] {
  const urls = [`http://${domain}`]
  if (tls.mode !== "none") urls.push(`https://${domain}`)
  return urls
}
