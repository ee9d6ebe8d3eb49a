/**
 * mimizuku — Probe Registry
 *
 * 実行順・優先度・タイムアウト区分を持つ Probe 定義の固定リスト。
 * ScanResult のキー順とレポートの並び順はこの順序に従う。
 */

import type { ProbeDescriptor } from '../types/probe.js';
import { AddressProbe } from '../probes/address-probe.js';
import { CloudDetectionProbe } from '../probes/cloud-detection-probe.js';
import { DnsProbe } from '../probes/dns-probe.js';
import { GatedProbe } from '../probes/gated-probe.js';
import { HttpProbe } from '../probes/http-probe.js';
import { PlaceholderProbe } from '../probes/placeholder-probe.js';
import { PortProbe } from '../probes/port-probe.js';
import { SecurityHeadersProbe } from '../probes/security-headers-probe.js';
import { SslProbe } from '../probes/ssl-probe.js';
import { SubdomainProbe } from '../probes/subdomain-probe.js';
import { TechnologyProbe } from '../probes/technology-probe.js';
import { WhoisProbe } from '../probes/whois-probe.js';

export const PROBE_REGISTRY: readonly ProbeDescriptor[] = Object.freeze([
  {
    name: 'dns',
    priority: 'critical',
    description: 'DNS records, SPF, DMARC, MX and CAA analysis',
    create: () => new DnsProbe(),
  },
  {
    name: 'whois',
    priority: 'high',
    description: 'Registration data via RDAP: age, expiry, exposed contacts',
    create: () => new WhoisProbe(),
  },
  {
    name: 'ssl',
    priority: 'high',
    description: 'TLS certificate and protocol analysis on port 443',
    create: () => new SslProbe(),
  },
  {
    name: 'subdomains',
    priority: 'high',
    description: 'Resolution of common subdomain names',
    create: () => new SubdomainProbe(),
  },
  {
    name: 'ports',
    priority: 'critical',
    portScan: true,
    description: 'TCP connect scan of 25 common ports',
    create: () => new PortProbe(),
  },
  {
    name: 'http',
    priority: 'high',
    description: 'HTTP/HTTPS availability, redirects, robots.txt and sitemap',
    create: () => new HttpProbe(),
  },
  {
    name: 'technology',
    priority: 'medium',
    description: 'Technology fingerprinting from headers and HTML',
    create: () => new TechnologyProbe(),
  },
  {
    name: 'emails',
    priority: 'medium',
    description: 'Email address discovery (not implemented)',
    create: () => new PlaceholderProbe('Email harvesting', 'Email discovery requires web scraping and API integration'),
  },
  {
    name: 'security_headers',
    priority: 'high',
    description: 'HTTP security header score and value analysis',
    create: () => new SecurityHeadersProbe(),
  },
  {
    name: 'certificate_transparency',
    priority: 'medium',
    description: 'Certificate Transparency log search (not implemented)',
    create: () => new PlaceholderProbe('Certificate Transparency search', 'CT log search requires API integration'),
  },
  {
    name: 'cloud_detection',
    priority: 'medium',
    description: 'Cloud and CDN provider detection from DNS names',
    create: () => new CloudDetectionProbe(),
  },
  {
    name: 'reputation',
    priority: 'critical',
    credential: 'virustotal',
    description: 'Domain reputation (VirusTotal)',
    create: () => new GatedProbe('virustotal', 'Reputation check'),
  },
  {
    name: 'web_intelligence',
    priority: 'high',
    credential: 'newsapi',
    description: 'News and web mentions (NewsAPI)',
    create: () => new GatedProbe('newsapi', 'Web intelligence search'),
  },
  {
    name: 'social_media',
    priority: 'medium',
    credential: 'twitter',
    description: 'Social media mentions (Twitter)',
    create: () => new GatedProbe('twitter', 'Social media search'),
  },
  {
    name: 'breaches',
    priority: 'critical',
    credential: 'hibp',
    description: 'Breach database check (Have I Been Pwned)',
    create: () => new GatedProbe('hibp', 'Breach database check'),
  },
  {
    name: 'github',
    priority: 'high',
    credential: 'github',
    description: 'Code search on GitHub',
    create: () => new GatedProbe('github', 'GitHub search'),
  },
  {
    name: 'shodan',
    priority: 'high',
    credential: 'shodan',
    description: 'Host information from Shodan',
    create: () => new GatedProbe('shodan', 'Shodan search'),
  },
  {
    name: 'wayback',
    priority: 'low',
    description: 'Wayback Machine history (not implemented)',
    create: () => new PlaceholderProbe('Wayback Machine search', 'Historical data search requires Wayback CDX API integration'),
  },
  {
    name: 'geolocation',
    priority: 'low',
    description: 'Address resolution for geolocation',
    create: () => new AddressProbe('geolocation'),
  },
  {
    name: 'asn',
    priority: 'medium',
    description: 'Address resolution for ASN lookup',
    create: () => new AddressProbe('asn'),
  },
] satisfies ProbeDescriptor[]);

export const PROBE_NAMES: readonly string[] = PROBE_REGISTRY.map((d) => d.name);

export function findProbe(name: string): ProbeDescriptor | undefined {
  return PROBE_REGISTRY.find((d) => d.name === name);
}
