/**
 * Download Listing HTML Template
 */

export const LISTING_PAGE_TEMPLATE = `<html><head><title>Downloads</title></head><body><h1>Downloaded Files</h1><ul>{{ITEMS}}</ul></body></html>`;

export const LISTING_ITEM_TEMPLATE = `<li><a href="/download/{{HREF}}">{{NAME}}</a> ({{SIZE_MB}} MB)</li>`;
