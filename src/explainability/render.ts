/**
 * Explanation Renderer
 *
 * Turns validated evidence into one of two fixed five-section texts:
 * title, price change summary, attribution narrative, confidence and
 * methodology, disclaimer. Rendering is pure; the same evidence always
 * yields the same text.
 */

import type { Audience } from '../types.js';
import type { RenderableEvidence, RenderableFeature } from '../evidence/schema.js';
import {
  confidenceLabel,
  currencySymbol,
  friendlyName,
  impactPercent,
} from './labels.js';

const DISCLAIMER =
  'This explanation is generated automatically based on model inputs. ' +
  'It does not constitute a legal or binding commitment.';

const SUPPORT_CONTACT = 'Please contact support for detailed inquiries.';

export function renderExplanation(evidence: RenderableEvidence, audience: Audience): string {
  return [
    renderTitle(audience),
    renderSummary(evidence, audience),
    renderAttribution(evidence, audience),
    renderConfidence(evidence, audience),
    renderDisclaimer(audience),
  ].join('\n\n');
}

/**
 * Features by descending attribution magnitude; ties keep their order.
 */
export function sortByImpact(features: ReadonlyArray<RenderableFeature>): RenderableFeature[] {
  return [...features].sort((a, b) => Math.abs(b.attribution) - Math.abs(a.attribution));
}

function renderTitle(audience: Audience): string {
  const suffix = audience === 'regulator' ? 'Regulatory Audit' : 'Customer Summary';
  return `# Price Change Explanation (${suffix})`;
}

function renderSummary(evidence: RenderableEvidence, audience: Audience): string {
  const symbol = currencySymbol(evidence.currency);
  const lines = [
    '**Price Change Summary**',
    `• Price: ${symbol}${evidence.old_price} → ${symbol}${evidence.new_price}`,
    `• Time Window: ${evidence.time_window.from} to ${evidence.time_window.to}`,
  ];
  if (audience === 'regulator') {
    lines.push(`• ML Model: ${evidence.model_version}`);
  }
  return lines.join('\n');
}

function renderAttribution(evidence: RenderableEvidence, audience: Audience): string {
  const lines = ['**Machine Learning–Based Feature Attribution**'];

  if (audience === 'regulator') {
    const direction = evidence.new_price > evidence.old_price ? 'increase' : 'decrease';
    lines.push(`The model detected a price ${direction} driven by the following factors:`);
  } else {
    lines.push('We adjusted the price due to the following main factors:');
  }

  const features = sortByImpact(evidence.features_used);
  if (features.length === 0) {
    lines.push('• No individual factor exceeded the attribution threshold.');
  }

  for (const feature of features) {
    const impact = impactPercent(feature.attribution);
    if (audience === 'regulator') {
      lines.push(
        `• ${feature.name}: ${impact}% attribution (Input change: ${feature.value_change_pct}%)`,
      );
    } else {
      lines.push(`• ${friendlyName(feature.name)}: ≈${impact}% impact (Factor ${factorDirection(feature)})`);
    }
  }

  return lines.join('\n');
}

function factorDirection(feature: RenderableFeature): string {
  if (feature.name === 'competitor_price_avg') return 'fluctuation';
  return feature.value_change_pct > 0 ? 'increased' : 'decreased';
}

function renderConfidence(evidence: RenderableEvidence, audience: Audience): string {
  const method = evidence.xai_method;
  const lines = [
    '**Confidence Score & Methodology**',
    `• Confidence Level: ${confidenceLabel(evidence.confidence_score)} (${evidence.confidence_score})`,
    `• Methodology: Feature importance calculated using ${method}.`,
  ];
  if (audience === 'regulator') {
    lines.push(`• Traceability: All values derived from Model ${evidence.model_version} via ${method}.`);
  }
  return lines.join('\n');
}

function renderDisclaimer(audience: Audience): string {
  const text = audience === 'customer' ? `${DISCLAIMER} ${SUPPORT_CONTACT}` : DISCLAIMER;
  return `**Disclaimer**\n${text}`;
}
