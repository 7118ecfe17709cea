/**
 * Resolvable identifiers for containers, annotations, searches and indexes
 */

export class UriFactory {
  readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  containerUrl(containerName: string): string {
    return `${this.baseUrl}/w3c/${encodeURIComponent(containerName)}/`;
  }

  annotationUrl(containerName: string, annotationName: string): string {
    return `${this.containerUrl(containerName)}${encodeURIComponent(annotationName)}`;
  }

  searchUrl(containerName: string, searchId: string): string {
    return `${this.baseUrl}/services/${encodeURIComponent(containerName)}/search/${searchId}`;
  }

  searchInfoUrl(containerName: string, searchId: string): string {
    return `${this.searchUrl(containerName, searchId)}/info`;
  }

  searchPageUrl(containerName: string, searchId: string, page: number): string {
    return `${this.searchUrl(containerName, searchId)}?page=${page}`;
  }

  globalSearchUrl(searchId: string): string {
    return `${this.baseUrl}/global/search/${searchId}`;
  }

  globalSearchPageUrl(searchId: string, page: number): string {
    return `${this.globalSearchUrl(searchId)}?page=${page}`;
  }

  indexUrl(containerName: string, field: string, indexType: string): string {
    return (
      `${this.baseUrl}/services/${encodeURIComponent(containerName)}/indexes/` +
      `${encodeURIComponent(field)}/${indexType}`
    );
  }
}
