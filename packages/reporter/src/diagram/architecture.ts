import { emitArtifact, type ArtifactOutcome } from '../io/write-artifact.js';
import { REPORT_FILES } from '../model/report.js';
import { escapeXml, svgDocument, text } from '../charts/svg.js';

interface DiagramBox {
  id: string;
  title: string;
  subtitle?: string;
  x: number;
  y: number;
  width: number;
  height: number;
  fill: string;
}

interface DiagramArrow {
  from: string;
  to: string;
  label: string;
}

export const ARCHITECTURE_BOXES: readonly DiagramBox[] = [
  { id: 'client', title: 'User / Client', x: 330, y: 70, width: 180, height: 50, fill: '#ecf0f1' },
  {
    id: 'main',
    title: 'Main Agent',
    subtitle: 'REST API :8080',
    x: 330,
    y: 170,
    width: 180,
    height: 60,
    fill: '#3498db',
  },
  {
    id: 'nats',
    title: 'NATS Message Broker',
    subtitle: 'Pub/Sub :4222',
    x: 300,
    y: 290,
    width: 240,
    height: 60,
    fill: '#9b59b6',
  },
  { id: 'scanner', title: 'Scanner Agent', x: 60, y: 430, width: 170, height: 55, fill: '#2ecc71' },
  { id: 'analyzer', title: 'Analyzer Agent', x: 335, y: 430, width: 170, height: 55, fill: '#f39c12' },
  { id: 'reporter', title: 'Reporter Agent', x: 610, y: 430, width: 170, height: 55, fill: '#e74c3c' },
  { id: 'postgres', title: 'PostgreSQL', x: 610, y: 560, width: 170, height: 50, fill: '#34495e' },
];

export const ARCHITECTURE_ARROWS: readonly DiagramArrow[] = [
  { from: 'client', to: 'main', label: 'HTTP REST API' },
  { from: 'main', to: 'nats', label: 'NATS Publish' },
  { from: 'nats', to: 'scanner', label: 'scan.request' },
  { from: 'scanner', to: 'nats', label: 'scan.result' },
  { from: 'nats', to: 'analyzer', label: 'scan.result' },
  { from: 'analyzer', to: 'nats', label: 'service.info' },
  { from: 'nats', to: 'reporter', label: 'service.info' },
  { from: 'reporter', to: 'postgres', label: 'SQL INSERT' },
];

/** Plain-text rendition used by the text report. */
export const ARCHITECTURE_TEXT: readonly string[] = [
  '                 +------------------+',
  '                 |  User / Client   |',
  '                 +------------------+',
  '                          |  HTTP REST API',
  '                          v',
  '                 +------------------+',
  '                 |    Main Agent    |',
  '                 |  REST API :8080  |',
  '                 +------------------+',
  '                          |  NATS Publish',
  '                          v',
  '              +------------------------+',
  '              |  NATS Message Broker   |',
  '              |     Pub/Sub :4222      |',
  '              +------------------------+',
  '        scan.request |   scan.result |   service.info',
  '                     v               v               v',
  '  +---------------+  +----------------+  +----------------+',
  '  | Scanner Agent |  | Analyzer Agent |  | Reporter Agent |',
  '  +---------------+  +----------------+  +----------------+',
  '                                                 |  SQL INSERT',
  '                                                 v',
  '                                         +----------------+',
  '                                         |   PostgreSQL   |',
  '                                         +----------------+',
];

const WIDTH = 840;
const HEIGHT = 660;

const DIAGRAM_STYLE = [
  '.title { font-size: 20px; font-weight: bold; fill: #1f2937; }',
  '.box-title { font-size: 13px; font-weight: bold; }',
  '.box-subtitle { font-size: 11px; }',
  '.arrow { stroke: #4b5563; stroke-width: 1.5; fill: none; marker-end: url(#arrowhead); }',
  '.arrow-label { font-size: 10px; fill: #374151; }',
].join(' ');

function centre(box: DiagramBox): { x: number; y: number } {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

/** Point where the segment from the box centre towards (tx, ty) leaves the box. */
function edgePoint(box: DiagramBox, tx: number, ty: number): { x: number; y: number } {
  const c = centre(box);
  const dx = tx - c.x;
  const dy = ty - c.y;
  if (dx === 0 && dy === 0) {
    return c;
  }
  const scaleX = dx === 0 ? Number.POSITIVE_INFINITY : box.width / 2 / Math.abs(dx);
  const scaleY = dy === 0 ? Number.POSITIVE_INFINITY : box.height / 2 / Math.abs(dy);
  const scale = Math.min(scaleX, scaleY);
  return { x: c.x + dx * scale, y: c.y + dy * scale };
}

function textColour(fill: string): string {
  return fill === '#ecf0f1' ? '#1f2937' : '#ffffff';
}

/**
 * Static system-architecture diagram. Output is identical on every call.
 */
export function renderArchitectureSvg(): string {
  const byId = new Map(ARCHITECTURE_BOXES.map((box) => [box.id, box]));
  const body: string[] = [
    '<defs><marker id="arrowhead" markerWidth="10" markerHeight="7" refX="9" refY="3.5" orient="auto"><polygon points="0 0, 10 3.5, 0 7" fill="#4b5563"/></marker></defs>',
    text(WIDTH / 2, 36, 'Distributed Port Scanner Architecture', {
      class: 'title',
      'text-anchor': 'middle',
    }),
  ];

  ARCHITECTURE_ARROWS.forEach((arrow, index) => {
    const from = byId.get(arrow.from);
    const to = byId.get(arrow.to);
    if (!from || !to) {
      throw new Error(`Unknown diagram node in arrow ${arrow.from} -> ${arrow.to}`);
    }
    // Return legs are offset so the two directions do not overlap.
    const offset = arrow.to === 'nats' && arrow.from !== 'main' ? 12 : 0;
    const toCentre = centre(to);
    const fromCentre = centre(from);
    const start = edgePoint(from, toCentre.x, toCentre.y);
    const end = edgePoint(to, fromCentre.x, fromCentre.y);
    const sx = start.x + offset;
    const ex = end.x + offset;
    body.push(
      `<line x1="${Math.round(sx)}" y1="${Math.round(start.y)}" x2="${Math.round(ex)}" y2="${Math.round(end.y)}" class="arrow"/>`,
      text((sx + ex) / 2 + 6, (start.y + end.y) / 2 + (index % 2 === 0 ? -4 : 10), arrow.label, {
        class: 'arrow-label',
      })
    );
  });

  for (const box of ARCHITECTURE_BOXES) {
    const c = centre(box);
    const colour = textColour(box.fill);
    body.push(
      `<rect x="${box.x}" y="${box.y}" width="${box.width}" height="${box.height}" rx="8" fill="${box.fill}" stroke="#1f2937" stroke-width="1.5" data-node="${escapeXml(box.id)}"/>`
    );
    if (box.subtitle === undefined) {
      body.push(
        text(c.x, c.y + 5, box.title, {
          class: 'box-title',
          'text-anchor': 'middle',
          fill: colour,
        })
      );
    } else {
      body.push(
        text(c.x, c.y - 4, box.title, { class: 'box-title', 'text-anchor': 'middle', fill: colour }),
        text(c.x, c.y + 14, box.subtitle, {
          class: 'box-subtitle',
          'text-anchor': 'middle',
          fill: colour,
        })
      );
    }
  }

  return svgDocument(WIDTH, HEIGHT, body, DIAGRAM_STYLE);
}

export function renderArchitectureDiagram(outDir: string): Promise<ArtifactOutcome> {
  return emitArtifact(outDir, REPORT_FILES.architecture, renderArchitectureSvg);
}
