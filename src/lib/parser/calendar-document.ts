import type { CalendarDocument, PageTable } from "@/types/calendar";

export interface DocumentPage {
  text: string;
  tables: PageTable[];
}

export function createInMemoryDocument(pages: ReadonlyArray<Partial<DocumentPage>>): CalendarDocument {
  const snapshot: DocumentPage[] = pages.map((page) => ({
    text: page.text ?? "",
    tables: (page.tables ?? []).map((table) => table.map((row) => [...row]))
  }));

  const pageAt = (pageIndex: number): DocumentPage => {
    const page = snapshot[pageIndex];
    if (!page) {
      throw new RangeError(`Page index ${pageIndex} is outside 0..${snapshot.length - 1}`);
    }
    return page;
  };

  return {
    pageCount: snapshot.length,
    getPageText: (pageIndex) => pageAt(pageIndex).text,
    getPageTables: (pageIndex) => pageAt(pageIndex).tables.map((table) => table.map((row) => [...row]))
  };
}
