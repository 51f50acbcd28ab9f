export interface RowFixture {
  name?: string | null;
  position?: string | null;
  capHit?: string | null;
}

export function rosterRow({ name = 'Test Player', position = 'QB', capHit = '$1,000' }: RowFixture): string {
  const cells = [
    name === null ? '<td class="rank">1</td>' : `<td class="player"><a href="#">${name}</a></td>`,
    position === null ? '' : `<td class="center">${position}</td>`,
    '<td class="age">29</td>',
    capHit === null
      ? ''
      : `<td class="right result"><span title="Cap Hit">${capHit}</span></td>`,
  ];
  return `<tr>${cells.join('')}</tr>`;
}

export function rosterTable(rows: RowFixture[], footerTotal: string): string {
  return [
    '<table class="datatable rtable">',
    '<thead><tr><th>Player</th><th>Pos</th><th>Age</th><th>Cap Hit</th></tr></thead>',
    `<tbody>${rows.map(rosterRow).join('')}</tbody>`,
    '<tfoot><tr><td class="left">Totals</td><td></td><td></td>',
    `<td class="right result xs-visible"><span title="Cap Hit">${footerTotal}</span></td>`,
    '</tr></tfoot>',
    '</table>',
  ].join('');
}

export function headedTable(heading: string, rows: RowFixture[], footerTotal: string): string {
  return `<h2>${heading}</h2><div class="table-wrap">${rosterTable(rows, footerTotal)}</div>`;
}

export function capTotalsBlock(season: string, total: string): string {
  return [
    `<h2>${season} Cap Totals</h2>`,
    '<table class="datatable rtable captotal"><tbody>',
    '<tr><td>Active Roster</td><td>$0</td></tr>',
    `<tr><td>Total</td><td>${total}</td></tr>`,
    '</tbody></table>',
  ].join('');
}

export function page(...sections: string[]): string {
  return `<html><head><title>Cap</title></head><body>${sections.join('')}</body></html>`;
}

/** Team page with one active row, one dead cap row and a matching grand total. */
export function sampleTeamPage(grandTotal = '$6,000,000'): string {
  return page(
    '<h2>Active Roster</h2>',
    rosterTable([{ name: 'Pat Passer', position: 'QB', capHit: '$5,000,000' }], '$5,000,000'),
    headedTable('2023 Dead Cap', [{ name: 'Cut Player', position: 'WR', capHit: '$1,000,000' }], '$1,000,000'),
    capTotalsBlock('2023', grandTotal),
  );
}

export function navPage(names: string[]): string {
  const links = names.map((name) => `<a href="#">${name}</a>`).join('');
  return page(
    '<ul class="nav">',
    '<li class="cat-nba"><div class="subnav-posts"><a href="#">Boston Celtics</a></div></li>',
    `<li class="cat-nfl active"><div class="subnav"><div class="subnav-posts">${links}</div></div></li>`,
    '</ul>',
  );
}

export function teamNames(count: number): string[] {
  return Array.from({ length: count }, (_, index) =>
    index === 0 ? 'New England Patriots' : `Team Number ${index}`,
  );
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
