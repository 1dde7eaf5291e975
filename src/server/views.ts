import type { CatalogItem, InvoiceLine, InvoiceTotals } from '../types.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string): string {
  return `<!doctype html>
<html lang="sv">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>
body { font-family: sans-serif; margin: 0; display: grid; grid-template-columns: 18rem 1fr 1fr; gap: 1.5rem; padding: 1rem; }
section { min-width: 0; }
.item { border-bottom: 1px solid #ddd; padding: .5rem 0; }
.warning { color: #9a6700; }
table { border-collapse: collapse; width: 100%; }
td, th { text-align: left; padding: .2rem .4rem; border-bottom: 1px solid #eee; }
pre { background: #f6f8fa; padding: 1rem; overflow-x: auto; }
</style>
</head>
<body>
${body}
</body>
</html>`;
}

function kr(value: number): string {
  return `${value.toFixed(2)} kr`;
}

export interface IndexViewModel {
  query: string;
  showAll: boolean;
  results: CatalogItem[];
  lines: readonly InvoiceLine[];
  totals: InvoiceTotals;
  rotPercent: string;
  customerName: string;
  projectNumber: string;
  message?: string;
}

function sidebar(model: IndexViewModel): string {
  if (!model.lines.length) {
    return `<section id="summary"><h2>Faktura</h2><p>Ingen faktura skapad än</p></section>`;
  }

  const { totals } = model;
  const rot =
    totals.laborInclVat > 0
      ? `<dt>ROT-avdrag (${model.rotPercent}%)</dt><dd data-total="rot">${kr(totals.rotDeduction)}</dd>`
      : '';
  return `<section id="summary">
<h2>Faktura</h2>
<dl>
<dt>Total exkl moms</dt><dd data-total="excl">${kr(totals.totalExclVat)}</dd>
<dt>Total inkl moms</dt><dd data-total="incl">${kr(totals.totalInclVat)}</dd>
${rot}
<dt>Att betala</dt><dd data-total="due">${kr(totals.amountDue)}</dd>
</dl>
<form method="post" action="/cart/clear"><button type="submit">Rensa faktura</button></form>
</section>`;
}

function resultItem(item: CatalogItem, index: number, query: string): string {
  const itemNo = item.item_no ?? '';
  return `<div class="item" data-index="${index}">
<h3>${escapeHtml(item.item)}</h3>
<p><b>Art.nr:</b> ${escapeHtml(item.item_no ?? 'N/A')} <b>Kategori:</b> ${escapeHtml(item.category)} <b>Enhet:</b> ${escapeHtml(item.unit)} <b>Pris:</b> ${item.price ?? 0} kr/${escapeHtml(item.unit)}</p>
<form method="post" action="/cart/add">
<input type="hidden" name="item_no" value="${escapeHtml(itemNo)}">
<input type="hidden" name="item" value="${escapeHtml(item.item)}">
<input type="hidden" name="category" value="${escapeHtml(item.category)}">
<input type="hidden" name="unit" value="${escapeHtml(item.unit)}">
<input type="hidden" name="price" value="${item.price ?? ''}">
<input type="hidden" name="q" value="${escapeHtml(query)}">
<label>Antal <input type="number" name="quantity" min="0.1" step="0.5" value="1"></label>
<button type="submit">Lägg till</button>
</form>
</div>`;
}

function searchSection(model: IndexViewModel): string {
  let results = '';
  if (model.results.length) {
    results = `<p>Hittade ${model.results.length} artiklar</p>\n${model.results
      .map((item, i) => resultItem(item, i, model.query))
      .join('\n')}`;
  } else if (model.query) {
    results = '<p class="warning">Inga artiklar hittades</p>';
  }

  return `<section id="search">
<h2>Sök artiklar</h2>
<form method="get" action="/">
<input type="search" name="q" value="${escapeHtml(model.query)}" placeholder="Ex: grenuttag, 2405276, ARBETE">
<button type="submit">Sök</button>
</form>
<form method="get" action="/"><input type="hidden" name="all" value="1"><button type="submit">Visa alla artiklar</button></form>
${results}
</section>`;
}

function invoiceSection(model: IndexViewModel): string {
  if (!model.lines.length) {
    return `<section id="invoice"><h2>Aktuell faktura</h2><p>Lägg till artiklar från sökningen till vänster</p></section>`;
  }

  const rows = model.lines
    .map(
      (line, i) => `<tr data-line="${i}">
<td>${escapeHtml(line.itemNo ?? '')}</td><td>${escapeHtml(line.description)}</td><td>${line.quantity}</td><td>${escapeHtml(line.unit)}</td><td>${line.unitPrice.toFixed(2)}</td><td>${line.amount.toFixed(2)}</td>
<td><form method="post" action="/cart/remove"><input type="hidden" name="index" value="${i}"><button type="submit">Ta bort</button></form></td>
</tr>`,
    )
    .join('\n');

  return `<section id="invoice">
<h2>Aktuell faktura</h2>
<table>
<thead><tr><th>Art.nr</th><th>Beskrivning</th><th>Antal</th><th>Enhet</th><th>A-pris</th><th>Summa</th><th></th></tr></thead>
<tbody>
${rows}
</tbody>
</table>
<form method="post" action="/invoice">
<label>Kundnamn <input type="text" name="customer" value="${escapeHtml(model.customerName)}" placeholder="Ex: Andersson Bygg AB"></label>
<label>Projektnummer <input type="text" name="project" value="${escapeHtml(model.projectNumber)}" placeholder="Ex: P2024-001"></label>
<button type="submit">Generera faktura</button>
</form>
</section>`;
}

export function renderIndexPage(model: IndexViewModel): string {
  const message = model.message ? `<p class="warning" id="message">${escapeHtml(model.message)}</p>` : '';
  return layout('VVS Faktura', `${sidebar(model)}\n${searchSection(model)}\n${message}${invoiceSection(model)}`);
}

export function renderInvoicePage(invoiceText: string, customerName: string, projectNumber: string): string {
  const query = new URLSearchParams({ customer: customerName, project: projectNumber });
  return layout(
    'Förhandsvisning',
    `<section id="preview">
<h2>Förhandsvisning</h2>
<pre>${escapeHtml(invoiceText)}</pre>
<p><a href="/invoice.txt?${escapeHtml(query.toString())}">Ladda ner faktura (TXT)</a> · <a href="/">Tillbaka</a></p>
</section>`,
  );
}
